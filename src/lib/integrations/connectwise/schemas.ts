import { z } from 'zod';

// Only the fields the reconciler reads are declared; everything else passes
// through untouched because configuration updates resubmit the whole body.

export const contactReferenceSchema = z
  .object({
    id: z.number().int(),
    name: z.string().optional(),
    _info: z
      .object({
        contact_href: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const configurationSchema = z
  .object({
    id: z.number().int(),
    name: z.string().default(''),
    lastLoginName: z.string().nullish(),
    activeFlag: z.boolean().optional(),
    contact: contactReferenceSchema.nullish(),
  })
  .passthrough();

export const communicationItemSchema = z
  .object({
    value: z.string().nullish(),
    defaultFlag: z.boolean().optional(),
    communicationType: z.string().optional(),
  })
  .passthrough();

export const contactSchema = z
  .object({
    id: z.number().int(),
    firstName: z.string().nullish(),
    lastName: z.string().nullish(),
    title: z.string().nullish(),
    communicationItems: z.array(communicationItemSchema).optional(),
  })
  .passthrough();

export type ConnectWiseContactReference = z.infer<typeof contactReferenceSchema>;
export type ConnectWiseConfiguration = z.infer<typeof configurationSchema>;
export type ConnectWiseCommunicationItem = z.infer<typeof communicationItemSchema>;
export type ConnectWiseContact = z.infer<typeof contactSchema>;
