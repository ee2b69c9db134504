import Database from 'better-sqlite3';
import { z } from 'zod';
import { DateTimeUtils } from '../utils/date-time';
import { ClinicInfoSchema, ClinicRepository } from './repositories/clinic-repository';
import { PhysicianRepository } from './repositories/physician-repository';
import { NewTimeSlot, ScheduleRepository } from './repositories/schedule-repository';

const clockTime = z.string().refine(value => DateTimeUtils.normalizeTime(value) === value, {
    message: 'Expected HH:MM',
});

export const ScheduleTemplateSchema = z.object({
    days: z.number().int().positive(),
    closedWeekdays: z.array(z.number().int().min(0).max(6)).default([]), // 0 = Sunday
    startTime: clockTime,
    endTime: clockTime,
    slotMinutes: z.number().int().positive(),
});

const SeedPhysicianSchema = z.object({
    name: z.string().min(1),
    specialty: z.string().min(1),
    qualification: z.string().default(''),
    experience_years: z.number().int().min(0).default(0),
    consultation_price: z.number().positive(),
    bio: z.string().optional(),
    languages: z.array(z.string()).default([]),
});

export const SeedDataSchema = z.object({
    clinic: ClinicInfoSchema.optional(),
    schedule: ScheduleTemplateSchema,
    physicians: z.array(SeedPhysicianSchema),
});

export type ScheduleTemplate = z.infer<typeof ScheduleTemplateSchema>;
export type SeedData = z.infer<typeof SeedDataSchema>;

export interface SeedSummary {
    physiciansCreated: number;
    slotsCreated: number;
    clinicInfoSaved: boolean;
}

function toMinutes(time: string): number {
    const [hours, minutes] = time.split(':').map(Number);
    return hours * 60 + minutes;
}

function toClock(totalMinutes: number): string {
    const hours = Math.floor(totalMinutes / 60);
    const minutes = totalMinutes % 60;
    return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * Back-to-back slots from opening to closing time; a trailing partial slot is dropped
 */
export function dailySlots(template: ScheduleTemplate): NewTimeSlot[] {
    const slots: NewTimeSlot[] = [];
    const close = toMinutes(template.endTime);
    for (let start = toMinutes(template.startTime); start + template.slotMinutes <= close; start += template.slotMinutes) {
        slots.push({ start_time: toClock(start), end_time: toClock(start + template.slotMinutes) });
    }
    return slots;
}

export function scheduleDates(template: ScheduleTemplate, fromDate: string): string[] {
    const dates: string[] = [];
    for (let offset = 0; offset < template.days; offset++) {
        const date = DateTimeUtils.addDays(fromDate, offset);
        const weekday = new Date(`${date}T00:00:00Z`).getUTCDay();
        if (!template.closedWeekdays.includes(weekday)) {
            dates.push(date);
        }
    }
    return dates;
}

/**
 * Creates the physicians on an empty database, then opens the schedule window from
 * `fromDate` for every active physician. Re-running only adds the days not yet open.
 */
export function seedDatabase(database: Database.Database, data: SeedData, fromDate: string): SeedSummary {
    const physicians = new PhysicianRepository(database);
    const schedule = new ScheduleRepository(database);
    const clinic = new ClinicRepository(database);

    return database.transaction(() => {
        let physiciansCreated = 0;
        if (physicians.findAll().length === 0) {
            for (const physician of data.physicians) {
                physicians.create(physician);
                physiciansCreated++;
            }
        }

        const slots = dailySlots(data.schedule);
        const dates = scheduleDates(data.schedule, fromDate);
        let slotsCreated = 0;
        for (const physician of physicians.findAll()) {
            for (const date of dates) {
                slotsCreated += schedule.addTimeSlots(physician.id, date, slots);
            }
        }

        let clinicInfoSaved = false;
        if (data.clinic && !clinic.getInfo()) {
            clinic.saveInfo(data.clinic);
            clinicInfoSaved = true;
        }

        return { physiciansCreated, slotsCreated, clinicInfoSaved };
    })();
}
