import { describe, expect, it } from 'vitest';

import { buildConfiguration, buildContact, contactHref } from '../../../../test-utils/fixtures.js';
import { mapConfiguration, withContact } from './configurationMapper.js';
import { contactFullName, mapContact } from './contactMapper.js';

describe('mapConfiguration', () => {
  it('keeps the recorded contact reference', () => {
    const record = mapConfiguration(
      buildConfiguration(101, { lastLoginName: 'CORP\\JohnSmith', contact: { id: 40, name: 'Jon Smith' } })
    );

    expect(record).toEqual({
      id: 101,
      name: 'WS-101',
      lastLoginName: 'CORP\\JohnSmith',
      active: true,
      contact: { id: 40, name: 'Jon Smith', href: contactHref(40) },
    });
  });

  it('treats a missing active flag as inactive', () => {
    const { activeFlag: _activeFlag, ...withoutFlag } = buildConfiguration(102);

    expect(mapConfiguration(withoutFlag).active).toBe(false);
  });
});

describe('withContact', () => {
  it('replaces only the contact reference', () => {
    const live = buildConfiguration(101, { lastLoginName: 'CORP\\JohnSmith', contact: { id: 40, name: 'Jon Smith' } });
    const contact = mapContact(buildContact(11, 'John', 'Smith'));

    const updated = withContact(live, contact, contactHref(11));

    expect(updated).toEqual({
      ...live,
      contact: { id: 11, name: 'John Smith', _info: { contact_href: contactHref(11) } },
    });
    expect(live.contact?.id).toBe(40);
  });
});

describe('mapContact', () => {
  it('trims names and picks the default email and phone', () => {
    const contact = mapContact({
      ...buildContact(12, ' Jane ', 'Doe ', { title: 'Office Manager', email: 'jane.doe@example.com' }),
      communicationItems: [
        { value: '555-0100', defaultFlag: false, communicationType: 'Phone' },
        { value: '555-0199', defaultFlag: true, communicationType: 'Phone' },
        { value: 'jane.doe@example.com', defaultFlag: true, communicationType: 'Email' },
      ],
    });

    expect(contact).toEqual({
      id: 12,
      firstName: 'Jane',
      lastName: 'Doe',
      title: 'Office Manager',
      defaultEmail: 'jane.doe@example.com',
      defaultPhone: '555-0199',
    });
  });

  it('joins single names without trailing whitespace', () => {
    expect(contactFullName({ firstName: 'Madonna', lastName: '' })).toBe('Madonna');
  });
});
