import Database from 'better-sqlite3';
import { z } from 'zod';
import { db } from '../client';
import { logger } from '../../services/logging';

export const ClinicInfoSchema = z.object({
    name: z.string(),
    description: z.string().default(''),
    address: z.string().optional(),
    phone: z.string().optional(),
    email: z.string().optional(),
    website: z.string().optional(),
    workingHours: z.record(z.string()).default({}),
});

export type ClinicInfo = z.infer<typeof ClinicInfoSchema>;

export class ClinicRepository {
    constructor(private readonly database: Database.Database) {}

    getInfo(): ClinicInfo | null {
        const row = this.database
            .prepare<[], { info_json: string }>('SELECT info_json FROM clinic_info WHERE id = 1')
            .get();
        if (!row) return null;

        try {
            const parsed = ClinicInfoSchema.safeParse(JSON.parse(row.info_json));
            if (parsed.success) return parsed.data;
            logger.warn('Stored clinic info does not match schema', { issues: parsed.error.issues });
        } catch (error) {
            logger.warn('Stored clinic info is not valid JSON', { error: String(error) });
        }
        return null;
    }

    saveInfo(info: ClinicInfo): void {
        this.database.prepare(`
            INSERT INTO clinic_info (id, info_json)
            VALUES (1, ?)
            ON CONFLICT(id) DO UPDATE SET
                info_json = excluded.info_json,
                updated_at = CURRENT_TIMESTAMP
        `).run(JSON.stringify(info));
    }
}

export const clinicRepository = new ClinicRepository(db);
