#!/usr/bin/env node
import { runMigrations } from '@coinpurse/db';
import { type ClosableDomainServices, createDomainServices } from '@coinpurse/domain';

import { loadWorkspaceEnv } from './load-env.js';
import { buildProgram } from './program.js';

loadWorkspaceEnv();

const passwordHashRounds = Number(process.env.BCRYPT_ROUNDS);
const hasHashRounds = Number.isInteger(passwordHashRounds) && passwordHashRounds >= 4;

let services: ClosableDomainServices | null = null;
process.once('exit', () => {
  services?.close();
});

const program = buildProgram({
  getServices: () =>
    (services ??= createDomainServices({
      auth: hasHashRounds ? { passwordHashRounds } : {},
    })),
  migrate: () => runMigrations(),
});

if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

await program.parseAsync(process.argv);
