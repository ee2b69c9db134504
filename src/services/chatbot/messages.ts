import { AppointmentSummary, PaymentStatus } from '../../db/repositories/appointment-repository';
import { Physician, SpecialtyPriceRange } from '../../db/repositories/physician-repository';
import { ClinicInfo } from '../../db/repositories/clinic-repository';
import { InsuranceVerificationResult } from '../insurance/insurance-service';
import { OpenSlot } from '../scheduling/interfaces';

export const DATE_FORMAT_HINT = 'Please specify in YYYY-MM-DD format, e.g., 2025-05-15';

export const ERROR_REPLY =
    "I'm sorry, I encountered an error while processing your request. Please try again later or contact our clinic directly for assistance.";

export const HELP_REPLY =
    "I can help you book, reschedule or cancel an appointment, check physician availability, " +
    "verify your insurance coverage, and answer questions about our physicians, prices and clinic. " +
    "What would you like to do?";

export const RESTART_REPLY = "No problem, let's start over. How can I help you today?";

export const INTERRUPTED_NOTICE =
    "I notice we were discussing something else. You can say 'new conversation' to start fresh, or continue where we left off:";

const DEFAULT_CLINIC_REPLY =
    "Our clinic provides comprehensive healthcare services with a team of experienced physicians. " +
    "For specific details about our location and contact information, please call our reception.";

function listOrNone(items: string[]): string {
    return items.length > 0 ? items.join(', ') : 'none at the moment';
}

export function greeting(firstName: string | null): string {
    if (!firstName) {
        return "Hello and welcome to our clinic! I'm your virtual assistant. " +
            'I can help you book appointments, check availability, verify insurance and answer questions about our services. ' +
            'How can I help you today?';
    }
    return `Welcome back, ${firstName}! How can I help you today?`;
}

export function askSpecialty(specialties: string[]): string {
    return "I'd be happy to help you book an appointment. What type of specialist would you like to see? " +
        `Our available specialties include: ${listOrNone(specialties)}`;
}

export function askAvailabilitySpecialty(specialties: string[]): string {
    return 'I can help you check physician availability. Which specialty are you interested in? ' +
        `Our available specialties include: ${listOrNone(specialties)}`;
}

export function unknownSpecialty(specialty: string, specialties: string[]): string {
    return `I'm sorry, we don't have any ${specialty} specialists available currently. ` +
        `Would you like to check another specialty? Our available specialties include: ${listOrNone(specialties)}`;
}

export function askBookingDate(specialty: string, physicians: Physician[]): string {
    const lines = physicians.map(p =>
        `Dr. ${p.name} - ${p.experience_years} years experience, ${p.consultation_price} AED`
    );
    return `Great! Here are some of our ${specialty} specialists:\n\n${lines.join('\n')}\n\n` +
        `What date would you like to book your appointment? (${DATE_FORMAT_HINT})`;
}

export function askAvailabilityDate(specialty: string): string {
    return `For which date would you like to check ${specialty} appointments? ${DATE_FORMAT_HINT}`;
}

export function pastDate(date: string): string {
    return `${date} has already passed. Which other date would suit you? ${DATE_FORMAT_HINT}`;
}

export function noSlotsOnDate(subject: string, date: string, nextDates: string[]): string {
    const next = nextDates.length > 0
        ? ` The next available dates are: ${nextDates.join(', ')}.`
        : '';
    return `I'm sorry, there are no available appointments for ${subject} on ${date}.${next} Would you like to try another date?`;
}

export function noAvailabilitySoon(specialty: string): string {
    return `I'm sorry, there are no available appointments for ${specialty} in the near future. ` +
        'Please contact our clinic directly for assistance.';
}

export function askTime(subject: string, date: string, times: string[]): string {
    return `What time would you prefer for your ${subject} appointment on ${date}? Available times: ${times.join(', ')}`;
}

export function timeUnavailable(time: string, date: string, times: string[]): string {
    return `I'm sorry, ${time} is not available on ${date}. Available times: ${times.join(', ')}. Which time would you prefer?`;
}

export function availableSlots(specialty: string, date: string, slots: OpenSlot[]): string {
    const lines = slots.map(s => `${s.startTime} - ${s.endTime} (Dr. ${s.physicianName})`);
    return `Here are the available appointments for ${specialty} on ${date}:\n\n${lines.join('\n')}\n\n` +
        'Would you like to book any of these appointments? Just reply with the time you prefer.';
}

export function booked(appointmentId: number, slot: OpenSlot, specialty: string): string {
    return `Your ${specialty} appointment with Dr. ${slot.physicianName} on ${slot.date} at ${slot.startTime} is reserved ` +
        `(reference #${appointmentId}). The consultation fee is ${slot.consultationPrice} AED; ` +
        'your appointment is confirmed once payment is received.';
}

type AppointmentAction = 'cancel' | 'reschedule';

export function noUpcomingAppointments(action: AppointmentAction): string {
    return `You don't have any upcoming appointments to ${action}. Would you like to book a new appointment instead?`;
}

export function appointmentList(appointments: AppointmentSummary[], action: AppointmentAction, invalidChoice: boolean = false): string {
    const lines = appointments.map((a, i) =>
        `${i + 1}. ${a.date} at ${a.start_time} with Dr. ${a.physician_name} (${a.specialty})`
    );
    const prefix = invalidChoice ? "I couldn't match that to one of your appointments. " : '';
    return `${prefix}Here are your upcoming appointments:\n\n${lines.join('\n')}\n\n` +
        `Which appointment would you like to ${action}? Please reply with the number.`;
}

export function appointmentUnavailable(): string {
    return 'That appointment can no longer be changed. Please contact our clinic directly for assistance.';
}

export function cancelled(appointment: AppointmentSummary, paymentStatus: PaymentStatus = appointment.payment_status): string {
    const refund = paymentStatus === 'refunded'
        ? ' Your payment has been refunded.'
        : paymentStatus === 'refund_failed'
            ? ' We could not refund your payment automatically; our team will process it and contact you.'
            : '';
    return `Your appointment on ${appointment.date} at ${appointment.start_time} with Dr. ${appointment.physician_name} has been cancelled.${refund} ` +
        'Would you like to book a new appointment?';
}

export function askRescheduleDate(appointment: AppointmentSummary): string {
    return `Your appointment with Dr. ${appointment.physician_name} is currently on ${appointment.date} at ${appointment.start_time}. ` +
        `Which date would you like to move it to? ${DATE_FORMAT_HINT}`;
}

export function rescheduled(physicianName: string, date: string, time: string): string {
    return `Done! Your appointment with Dr. ${physicianName} has been moved to ${date} at ${time}.`;
}

export function askEmiratesId(): string {
    return "To check your insurance coverage, I'll need your Emirates ID number. " +
        'Please provide your Emirates ID in the format XXX-XXXX-XXXXXXX-X';
}

export function insuranceResult(result: InsuranceVerificationResult): string {
    const coverage = result.coverage;
    switch (result.status) {
        case 'active':
            return `Good news! Your insurance is active with ${result.provider ?? 'your provider'}.\n\n` +
                `Plan: ${coverage.planName ?? 'N/A'}\n` +
                `Coverage type: ${coverage.coverageType ?? 'N/A'}\n` +
                `Member ID: ${coverage.memberId ?? 'N/A'}\n` +
                `Expiry date: ${coverage.expiryDate ?? 'N/A'}\n\n` +
                'Would you like to book an appointment now?';
        case 'expired':
            return `Your insurance with ${result.provider ?? 'your provider'} has expired on ${coverage.expiryDate ?? 'unknown date'}. ` +
                'Please contact your insurance provider to renew your coverage. Would you like to book a self-pay appointment instead?';
        case 'inactive':
            return `Your insurance with ${result.provider ?? 'your provider'} is currently inactive due to: ${coverage.reason ?? 'unknown reason'}. ` +
                'Please contact your insurance provider to resolve this issue. Would you like to book a self-pay appointment instead?';
        case 'not_found':
            return "I couldn't find any insurance records associated with the Emirates ID you provided. " +
                'If you believe this is an error, please contact our clinic directly or your insurance provider. ' +
                'Would you like to book a self-pay appointment?';
        case 'error':
            return `I encountered an error while checking your insurance status: ${result.errorMessage ?? 'unknown error'}. ` +
                'Please try again later or contact our clinic directly for assistance.';
    }
}

export function askPhysicianQuery(specialties: string[]): string {
    return 'I can provide information about our physicians. ' +
        `Are you looking for a specific specialty? Our available specialties include: ${listOrNone(specialties)}. ` +
        "Or if you know the doctor's name, you can mention that as well.";
}

export function physicianDetails(physician: Physician): string {
    const languages = physician.languages.length > 0 ? physician.languages.join(', ') : 'N/A';
    const bio = physician.bio ? `\n\n${physician.bio}` : '';
    return `Dr. ${physician.name} - ${physician.specialty}\n` +
        `Qualification: ${physician.qualification}\n` +
        `Experience: ${physician.experience_years} years\n` +
        `Languages: ${languages}\n` +
        `Consultation fee: ${physician.consultation_price} AED${bio}\n\n` +
        `Would you like to book an appointment with Dr. ${physician.name}?`;
}

export function physiciansForSpecialty(specialty: string, physicians: Physician[]): string {
    const lines = physicians.map(p =>
        `Dr. ${p.name} - ${p.qualification}, ${p.experience_years} years experience`
    );
    return `Here are our ${specialty} specialists:\n\n${lines.join('\n')}\n\n` +
        'Would you like more information about any of them, or to book an appointment?';
}

export function physicianNotFound(): string {
    return "I'm sorry, I couldn't find specific information about that. " +
        "Could you please clarify which physician or specialty you're interested in?";
}

export function priceRanges(ranges: SpecialtyPriceRange[]): string {
    if (ranges.length === 0) {
        return 'Pricing information is not available at the moment. Please contact our clinic directly.';
    }
    const lines = ranges.map(r => `${r.specialty}: ${r.min} - ${r.max} AED`);
    return `Here are our consultation price ranges by specialty:\n\n${lines.join('\n')}\n\n` +
        'Would you like more detailed pricing for a specific specialty?';
}

export function specialtyPrices(specialty: string, physicians: Physician[]): string {
    const lines = physicians.map(p => `Dr. ${p.name} - ${p.consultation_price} AED`);
    return `Here are the consultation prices for our ${specialty} specialists:\n\n${lines.join('\n')}\n\n` +
        'Would you like to book an appointment with one of these physicians?';
}

export function unknownPricingSpecialty(specialty: string): string {
    return `I'm sorry, we don't have any ${specialty} specialists available currently. ` +
        'Would you like to check pricing for another specialty?';
}

export function clinicInfo(info: ClinicInfo | null): string {
    if (!info) return DEFAULT_CLINIC_REPLY;

    const hours = Object.entries(info.workingHours).map(([day, time]) => `${day}: ${time}`);
    const description = info.description ? `\n\n${info.description}` : '';
    return `${info.name}${description}\n\n` +
        `Address: ${info.address ?? 'N/A'}\n` +
        `Phone: ${info.phone ?? 'N/A'}\n` +
        `Email: ${info.email ?? 'N/A'}\n` +
        `Website: ${info.website ?? 'N/A'}\n\n` +
        `Working Hours:\n${hours.length > 0 ? hours.join('\n') : 'N/A'}\n\n` +
        'How can I assist you further? Would you like to book an appointment or check physician availability?';
}
