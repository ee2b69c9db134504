import Database from 'better-sqlite3';
import { db } from '../client';

export interface Physician {
    id: number;
    name: string;
    specialty: string;
    qualification: string;
    experience_years: number;
    consultation_price: number;
    bio: string | null;
    languages: string[];
    is_active: boolean;
}

export type NewPhysician = Omit<Physician, 'id' | 'is_active' | 'bio'> & { bio?: string };

export interface SpecialtyPriceRange {
    specialty: string;
    min: number;
    max: number;
    avg: number;
}

interface PhysicianRow extends Omit<Physician, 'languages' | 'is_active'> {
    languages: string;
    is_active: number;
}

function parseLanguages(raw: string): string[] {
    try {
        const parsed: unknown = JSON.parse(raw);
        return Array.isArray(parsed) ? parsed.filter((l): l is string => typeof l === 'string') : [];
    } catch {
        return [];
    }
}

function toPhysician(row: PhysicianRow): Physician {
    return {
        ...row,
        languages: parseLanguages(row.languages),
        is_active: row.is_active === 1,
    };
}

export class PhysicianRepository {
    constructor(private readonly database: Database.Database) {}

    create(physician: NewPhysician): number {
        const result = this.database.prepare(`
            INSERT INTO physicians (
                name, specialty, qualification, experience_years,
                consultation_price, bio, languages
            ) VALUES (?, ?, ?, ?, ?, ?, ?)
        `).run(
            physician.name,
            physician.specialty,
            physician.qualification,
            physician.experience_years,
            physician.consultation_price,
            physician.bio ?? null,
            JSON.stringify(physician.languages)
        );
        return Number(result.lastInsertRowid);
    }

    findById(id: number): Physician | null {
        const row = this.database
            .prepare<[number], PhysicianRow>('SELECT * FROM physicians WHERE id = ?')
            .get(id);
        return row ? toPhysician(row) : null;
    }

    findAll(): Physician[] {
        return this.database
            .prepare<[], PhysicianRow>('SELECT * FROM physicians WHERE is_active = 1 ORDER BY name')
            .all()
            .map(toPhysician);
    }

    findBySpecialty(specialty: string): Physician[] {
        return this.database
            .prepare<[string], PhysicianRow>(`
                SELECT * FROM physicians
                WHERE specialty = ? COLLATE NOCASE AND is_active = 1
                ORDER BY name ASC
            `)
            .all(specialty)
            .map(toPhysician);
    }

    /**
     * Case-insensitive partial match, e.g. "khan" or "Dr. Khan" finds "Sara Khan"
     */
    findByName(name: string): Physician | null {
        const query = name.trim().replace(/^dr(\.\s*|\s+)/i, '').trim();
        if (!query) return null;

        const row = this.database
            .prepare<[string], PhysicianRow>(`
                SELECT * FROM physicians
                WHERE name LIKE '%' || ? || '%' ESCAPE '\\' AND is_active = 1
                ORDER BY name ASC
                LIMIT 1
            `)
            .get(query.replace(/[\\%_]/g, '\\$&'));
        return row ? toPhysician(row) : null;
    }

    listSpecialties(): string[] {
        return this.database
            .prepare<[], { specialty: string }>(`
                SELECT DISTINCT specialty FROM physicians
                WHERE is_active = 1
                ORDER BY specialty ASC
            `)
            .all()
            .map(row => row.specialty);
    }

    /**
     * Maps user input ("cardiology") to the stored spelling ("Cardiology")
     */
    resolveSpecialty(input: string): string | null {
        const row = this.database
            .prepare<[string], { specialty: string }>(`
                SELECT specialty FROM physicians
                WHERE specialty = ? COLLATE NOCASE AND is_active = 1
                LIMIT 1
            `)
            .get(input.trim());
        return row?.specialty ?? null;
    }

    priceRanges(): SpecialtyPriceRange[] {
        return this.database
            .prepare<[], SpecialtyPriceRange>(`
                SELECT specialty,
                       MIN(consultation_price) AS min,
                       MAX(consultation_price) AS max,
                       AVG(consultation_price) AS avg
                FROM physicians
                WHERE is_active = 1
                GROUP BY specialty
                ORDER BY specialty ASC
            `)
            .all();
    }
}

export const physicianRepository = new PhysicianRepository(db);
