#!/usr/bin/env node

import { Command } from 'commander';
import { auditLedgerCommand } from './commands/auditLedger';
import { maintenanceCommands } from './commands/maintenance';
import { migrateCommand } from './commands/migrate';

const program = new Command();

program
  .name('broker-admin')
  .description('Administrative tasks for the relay broker')
  .version('1.0.0');

program
  .command('migrate')
  .description('Apply pending database migrations')
  .action(() => {
    migrateCommand().catch((error) => {
      console.error('Error:', error);
      process.exit(1);
    });
  });

program
  .command('audit-ledger')
  .description('Compare every cached balance with the sum of its transactions')
  .action(() => {
    auditLedgerCommand().catch((error) => {
      console.error('Error:', error);
      process.exit(1);
    });
  });

maintenanceCommands(program);

program.parse(process.argv);

if (!process.argv.slice(2).length) {
  program.outputHelp();
}
