/**
 * Provision an account
 *
 * Usage: npm run provision -- <accountId> <pin> [initialBalance]
 *
 * Creates the account or, when it exists, replaces its PIN. The initial
 * balance only applies on creation; existing balances move through the
 * ledger alone.
 */

import { config } from '../config';
import { connectDatabase, disconnectDatabase } from '../config/database';
import { Account } from '../models';
import { logger } from '../observability';
import { createPinDigester } from '../utils/credentials';

export interface ProvisionArgs {
  accountId: number;
  pin: string;
  initialBalance: number;
}

export const parseProvisionArgs = (argv: readonly string[]): ProvisionArgs => {
  const [rawAccountId, pin, rawBalance = '0'] = argv;

  if (rawAccountId === undefined || pin === undefined) {
    throw new Error('Usage: provision-account <accountId> <pin> [initialBalance]');
  }

  const accountId = Number(rawAccountId);
  if (!Number.isSafeInteger(accountId)) {
    throw new Error(`Account id must be an integer, got "${rawAccountId}"`);
  }
  if (pin.length === 0 || pin.length > 32) {
    throw new Error('PIN must be between 1 and 32 characters');
  }

  const initialBalance = Number(rawBalance);
  if (!Number.isSafeInteger(initialBalance)) {
    throw new Error(`Initial balance must be an integer, got "${rawBalance}"`);
  }

  return { accountId, pin, initialBalance };
};

const provision = async ({ accountId, pin, initialBalance }: ProvisionArgs): Promise<void> => {
  const digest = createPinDigester(config.credentials.pepper);

  await connectDatabase();
  try {
    const result = await Account.updateOne(
      { accountId },
      {
        $set: { credentialDigest: digest(pin) },
        $setOnInsert: { accountId, balance: initialBalance },
      },
      { upsert: true }
    );

    logger.info(
      { accountId, created: result.upsertedCount === 1 },
      result.upsertedCount === 1 ? 'Account created' : 'Account PIN replaced'
    );
  } finally {
    await disconnectDatabase();
  }
};

if (require.main === module) {
  Promise.resolve()
    .then(() => provision(parseProvisionArgs(process.argv.slice(2))))
    .catch((error: unknown) => {
      logger.error({ err: error }, 'Provisioning failed');
      process.exitCode = 1;
    });
}
