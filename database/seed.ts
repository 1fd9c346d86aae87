// Load environment variables FIRST (before any other imports)
import dotenv from 'dotenv';
dotenv.config();

import { db } from '../src/config/database';
import { logger } from '../src/utils/logger';
import { UserService } from '../src/services/user.service';
import { AdvertisementService } from '../src/services/advertisement.service';
import { CreateAdvertisementInput } from '../src/types/advertisement.types';
import { UserRole } from '../src/types/user.types';

const SEED_PASSWORD = process.env.SEED_PASSWORD || 'changeme123';

/**
 * Sample accounts and their listings
 */
const sampleUsers: Array<{
  username: string;
  email: string;
  role: UserRole;
  advertisements: CreateAdvertisementInput[];
}> = [
  {
    username: 'admin',
    email: 'admin@example.com',
    role: 'admin',
    advertisements: [],
  },
  {
    username: 'alice',
    email: 'alice@example.com',
    role: 'user',
    advertisements: [
      {
        title: 'Mountain bike',
        description: 'Aluminium frame, 21 gears, lightly used.',
        price: 250,
      },
      {
        title: 'Bike helmet',
        description: 'Size M, never dropped.',
        price: 30,
      },
    ],
  },
  {
    username: 'bob',
    email: 'bob@example.com',
    role: 'user',
    advertisements: [
      {
        title: 'Sofa',
        description: 'Three-seat sofa, grey fabric. Pick-up only.',
        price: 120,
      },
    ],
  },
];

async function seed(): Promise<void> {
  try {
    logger.info('Seeding database...');

    const pool = db.getPool();
    const userService = new UserService(pool);
    const advertisementService = new AdvertisementService(pool);

    for (const sample of sampleUsers) {
      const existing = await userService.findByUsername(sample.username);
      if (existing) {
        logger.info(`Skipping existing user: ${sample.username}`);
        continue;
      }

      const user = await userService.createUser({
        username: sample.username,
        email: sample.email,
        password: SEED_PASSWORD,
        role: sample.role,
      });

      for (const advertisement of sample.advertisements) {
        await advertisementService.create(advertisement, user.id);
      }

      logger.info(`Seeded ${sample.username}`, {
        advertisements: sample.advertisements.length,
      });
    }

    logger.info('Seeding completed');
    await db.close();
    process.exit(0);
  } catch (error) {
    logger.error('Seeding failed:', error);
    await db.close();
    process.exit(1);
  }
}

void seed();
