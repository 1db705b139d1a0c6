/**
 * Grant admin rights to an existing user.
 *
 *   npm run promote-admin -- user@example.com
 */

import { AuthService } from '../auth';
import { config } from '../config';
import { connectDatabase, disconnectDatabase } from '../config/database';
import { logger } from '../observability';
import { createStores } from '../stores';
import { UserType } from '../types/identity';

const main = async (): Promise<void> => {
  const email = process.argv[2];
  if (!email) {
    throw new Error('Usage: promote-admin <email>');
  }

  await connectDatabase();
  try {
    const { identity } = createStores({ ...config.ledger, store: 'mongo' });
    const user = await new AuthService(identity).setUserType(email, UserType.ADMIN);
    logger.info({ userId: user.id, email: user.email }, 'User promoted to admin');
  } finally {
    await disconnectDatabase();
  }
};

main().catch((error: unknown) => {
  logger.error({ err: error }, 'Failed to promote user');
  process.exitCode = 1;
});
