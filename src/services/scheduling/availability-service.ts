import { config } from '../../config';
import { PhysicianRepository, physicianRepository } from '../../db/repositories/physician-repository';
import { ScheduleRepository, scheduleRepository } from '../../db/repositories/schedule-repository';
import { DateTimeUtils } from '../../utils/date-time';
import { IAvailabilityService, OpenSlot, SlotScope } from './interfaces';

export interface AvailabilityOptions {
    lookaheadDays: number;
    nextDatesLimit: number;
}

export class AvailabilityService implements IAvailabilityService {
    constructor(
        private readonly physicians: PhysicianRepository,
        private readonly schedule: ScheduleRepository,
        private readonly options: AvailabilityOptions = config.scheduling
    ) {}

    listSpecialties(): string[] {
        return this.physicians.listSpecialties();
    }

    resolveSpecialty(input: string): string | null {
        return this.physicians.resolveSpecialty(input);
    }

    /**
     * Open slots for the day, earliest first; physicians sharing a start time are ordered by name
     */
    getOpenSlots(scope: SlotScope, date: string): OpenSlot[] {
        return this.schedule.findOpenSlots(scope, date);
    }

    /**
     * Searches forward from the day after `afterDate` across the look-ahead window
     */
    getNextAvailableDates(scope: SlotScope, afterDate: string): string[] {
        const until = DateTimeUtils.addDays(afterDate, this.options.lookaheadDays);
        return this.schedule.findDatesWithOpenSlots(scope, afterDate, until, this.options.nextDatesLimit);
    }
}

export const availabilityService = new AvailabilityService(physicianRepository, scheduleRepository);
