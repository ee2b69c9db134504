import fs from 'fs';
import path from 'path';
import { config } from '../config';
import { db, initDatabase, closeDatabase } from '../db/client';
import { SeedDataSchema, seedDatabase } from '../db/seed';
import { DateTimeUtils } from '../utils/date-time';

/**
 * Seeds physicians, their bookable slots and the clinic record.
 *
 * Usage: npm run seed -- [path/to/seed.json]
 * Schedules start tomorrow (clinic timezone) and can be rolled forward by re-running.
 */
function seed(): void {
    const seedFile = path.resolve(process.argv[2] ?? config.paths.seedData);
    console.log(`🌱 Seeding database from ${seedFile}\n`);

    const parsed = SeedDataSchema.safeParse(JSON.parse(fs.readFileSync(seedFile, 'utf-8')));
    if (!parsed.success) {
        console.error('✗ Seed file is invalid:');
        parsed.error.issues.forEach(issue => console.error(`   - ${issue.path.join('.')}: ${issue.message}`));
        process.exitCode = 1;
        return;
    }

    initDatabase();

    const tomorrow = DateTimeUtils.addDays(DateTimeUtils.today(config.clinic.timezone), 1);
    const summary = seedDatabase(db, parsed.data, tomorrow);

    console.log(`✓ Physicians created: ${summary.physiciansCreated}`);
    console.log(`✓ Time slots opened: ${summary.slotsCreated}`);
    console.log(summary.clinicInfoSaved ? '✓ Clinic information saved' : '• Clinic information already present');
}

try {
    seed();
} catch (error) {
    console.error('✗ Seeding failed:', error);
    process.exitCode = 1;
} finally {
    closeDatabase();
}
