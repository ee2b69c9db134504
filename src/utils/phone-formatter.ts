const WHATSAPP_PREFIX = 'whatsapp:';

export class PhoneFormatter {
    /**
     * Reduces Twilio addresses ("whatsapp:+971 50 123 4567") and loose input to E.164 ("+971501234567")
     */
    static normalize(phone: string): string {
        const trimmed = phone.trim();
        const withoutChannel = trimmed.toLowerCase().startsWith(WHATSAPP_PREFIX)
            ? trimmed.slice(WHATSAPP_PREFIX.length)
            : trimmed;

        const digits = withoutChannel.replace(/\D/g, '');
        return digits ? `+${digits}` : '';
    }

    static isValid(phone: string): boolean {
        // Country code plus subscriber number, 8 to 15 characters including "+"
        return /^\+\d{7,14}$/.test(phone);
    }

    static toWhatsAppAddress(phone: string): string {
        return `${WHATSAPP_PREFIX}${this.normalize(phone)}`;
    }
}
