import { Appointment } from '../../db/repositories/appointment-repository';

/**
 * An open time slot together with the physician who offers it
 */
export interface OpenSlot {
    slotId: number;
    physicianId: number;
    physicianName: string;
    date: string;
    startTime: string;
    endTime: string;
    consultationPrice: number;
}

export type SlotScope =
    | { specialty: string }
    | { physicianId: number };

export interface IAvailabilityService {
    listSpecialties(): string[];
    resolveSpecialty(input: string): string | null;
    getOpenSlots(scope: SlotScope, date: string): OpenSlot[];
    getNextAvailableDates(scope: SlotScope, afterDate: string): string[];
}

export interface PaymentGateway {
    createIntent(appointment: Appointment): Promise<string>;
    refund(paymentIntentId: string): Promise<void>;
}
