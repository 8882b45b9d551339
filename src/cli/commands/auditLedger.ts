import { withServices } from '../context';

/** Exits non-zero when any cached balance disagrees with its transactions. */
export async function auditLedgerCommand(): Promise<void> {
  const mismatches = await withServices((services) => services.ledger.audit());

  if (mismatches.length === 0) {
    console.log('Ledger consistent: every balance equals the sum of its transactions');
    return;
  }

  console.log(`Found ${mismatches.length} inconsistent balance(s):`);
  for (const mismatch of mismatches) {
    console.log(
      `  ${mismatch.userId}  balance=${mismatch.cachedBalance}  transactions=${mismatch.transactionSum}`
    );
  }
  process.exitCode = 2;
}
