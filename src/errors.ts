export const MarketErrorCodes = {
    // Authorization
    INVALID_CAPABILITY: 'InvalidCapability',
    WRONG_ADDRESS: 'WrongAddress',
    INCORRECT_SUPPLIER: 'IncorrectSupplier',
    NOT_ADMIN: 'NotAdmin',
    // State
    OUT_OF_STOCK: 'OutOfStock',
    DUPLICATE_BID: 'DuplicateBid',
    NO_SUCH_BID: 'NoSuchBid',
    ORDER_NOT_SUBMITTED: 'OrderNotSubmitted',
    DISPUTE_FALSE: 'DisputeFalse',
    DISPUTE_ALREADY_OPEN: 'DisputeAlreadyOpen',
    NO_CONSUMER_SELECTED: 'NoConsumerSelected',
    ESCROW_EMPTY: 'EscrowEmpty',
    ALREADY_INITIALIZED: 'AlreadyInitialized',
    NOT_FOUND: 'NotFound',
    PRODUCT_MISMATCH: 'ProductMismatch',
    // Timing
    DEADLINE_EXPIRED: 'DeadlineExpired',
    DEADLINE_NOT_REACHED: 'DeadlineNotReached',
    // Value
    INSUFFICIENT_FUNDS: 'InsufficientFunds',
    INSUFFICIENT_BALANCE: 'InsufficientBalance',
    REQUIREMENTS_NOT_MET: 'RequirementsNotMet',
    INVALID_ARGUMENT: 'InvalidArgument',
} as const;

export type MarketErrorCode = (typeof MarketErrorCodes)[keyof typeof MarketErrorCodes];

export type MarketErrorCategory = 'authorization' | 'state' | 'timing' | 'value';

/**
 * Base class for every rejection raised by the marketplace contracts.
 *
 * Fabric clients only see the error message, so the stable code is repeated
 * at the front of it, e.g. `[OutOfStock] product PRODUCT_tx1 is not accepting bids`.
 */
export class MarketError extends Error {
    public readonly code: MarketErrorCode;
    public readonly category: MarketErrorCategory;

    constructor(code: MarketErrorCode, category: MarketErrorCategory, message: string) {
        super(`[${code}] ${message}`);
        this.name = 'MarketError';
        this.code = code;
        this.category = category;
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

export class AuthorizationError extends MarketError {
    constructor(code: MarketErrorCode, message: string) {
        super(code, 'authorization', message);
        this.name = 'AuthorizationError';
    }
}

export class StateError extends MarketError {
    constructor(code: MarketErrorCode, message: string) {
        super(code, 'state', message);
        this.name = 'StateError';
    }
}

export class TimingError extends MarketError {
    constructor(code: MarketErrorCode, message: string) {
        super(code, 'timing', message);
        this.name = 'TimingError';
    }
}

export class ValueError extends MarketError {
    constructor(code: MarketErrorCode, message: string) {
        super(code, 'value', message);
        this.name = 'ValueError';
    }
}

export class NotFoundError extends StateError {
    public readonly key: string;

    constructor(kind: string, key: string) {
        super(MarketErrorCodes.NOT_FOUND, `${kind} ${key} not found`);
        this.name = 'NotFoundError';
        this.key = key;
    }
}
