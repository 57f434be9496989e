import { Command } from 'commander';

import { guessNameFromLogin } from '../lib/reconcile/nameGuesser.js';

export function registerGuessCommand(program: Command) {
  program
    .command('guess')
    .description('Show the contact name guessed from a DOMAIN\\username login (no API calls)')
    .argument('<loginName>', 'Login name, e.g. CORP\\JohnSmith')
    .action((loginName: string) => {
      const guess = guessNameFromLogin(loginName);

      if (program.opts().json) {
        console.log(JSON.stringify({ loginName, guess }, null, 2));
        return;
      }

      if (!guess) {
        console.log(`No guess for "${loginName}"`);
        return;
      }
      console.log(`First name: ${guess.firstName}`);
      console.log(`Last name:  ${guess.lastName}`);
      console.log(`Full name:  ${guess.fullName}`);
    });
}
