export type ErrorMeta = Record<string, unknown>;

export class AppError extends Error {
    public readonly code: string;
    public readonly statusCode: number;
    public readonly meta: ErrorMeta;

    constructor(message: string, code: string = 'INTERNAL_ERROR', statusCode: number = 500, meta: ErrorMeta = {}) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.statusCode = statusCode;
        this.meta = meta;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class ValidationError extends AppError {
    constructor(message: string, meta: ErrorMeta = {}) {
        super(message, 'VALIDATION_ERROR', 400, meta);
    }
}

export class NotFoundError extends AppError {
    constructor(message: string, meta: ErrorMeta = {}) {
        super(message, 'NOT_FOUND', 404, meta);
    }
}

export class BookingError extends AppError {
    constructor(message: string, meta: ErrorMeta = {}) {
        super(message, 'BOOKING_ERROR', 409, meta);
    }
}

export class SlotUnavailableError extends BookingError {
    constructor(slotId: number) {
        super(`Time slot ${slotId} is no longer available`, { slotId });
    }
}

export class TelephonyError extends AppError {
    constructor(message: string, meta: ErrorMeta = {}) {
        super(message, 'TELEPHONY_ERROR', 502, meta);
    }
}

export class AIError extends AppError {
    constructor(message: string, meta: ErrorMeta = {}) {
        super(message, 'AI_ERROR', 502, meta);
    }
}

export class PaymentError extends AppError {
    constructor(message: string, meta: ErrorMeta = {}) {
        super(message, 'PAYMENT_ERROR', 502, meta);
    }
}
