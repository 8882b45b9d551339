import { Command } from 'commander';
import { withServices } from '../context';

export function maintenanceCommands(program: Command): void {
  program
    .command('reconcile')
    .description('Run one liveness pass and one session sweep')
    .action(() => {
      withServices(async ({ heartbeat, supervisor }) => {
        await supervisor.restore();
        const liveness = await heartbeat.reconcile();
        const sweep = await supervisor.sweep();
        console.log(
          `Nodes checked: ${liveness.checked}, decayed: ${liveness.decayed}, offline: ${liveness.offline}`
        );
        console.log(`Sessions closed by liveness: ${liveness.sessionsClosed}`);
        console.log(`Sessions timed out: ${sweep.timedOut}, idle: ${sweep.idle}, finished: ${sweep.finished}`);
      }).catch((error) => {
        console.error('Error:', error);
        process.exit(1);
      });
    });

  program
    .command('sync-gateways')
    .description('Fetch the public gateway feed once and upsert its entries')
    .action(() => {
      withServices(async ({ gateways }) => {
        const result = await gateways.sync();
        console.log(`Parsed: ${result.parsed}, upserted: ${result.upserted}, skipped: ${result.skipped}`);
      }).catch((error) => {
        console.error('Error:', error);
        process.exit(1);
      });
    });
}
