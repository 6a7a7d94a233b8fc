/**
 * Pool Errors
 *
 * Every failure of a pool operation is a PoolError. The execution host
 * rolls back all ledger state before the error reaches the caller.
 */

export type PoolErrorCode =
    | 'INVALID_RESERVES'
    | 'INSUFFICIENT_TOKEN_OFFER'
    | 'SLIPPAGE_EXCEEDED'
    | 'INVALID_AMOUNT'
    | 'TRANSFER_FAILED'
    | 'DIVIDE_BY_ZERO'
    | 'UNDERFLOW';

export class PoolError extends Error {
    readonly code: PoolErrorCode;

    constructor(code: PoolErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

export class InvalidReservesError extends PoolError {
    constructor(inputReserve: bigint, outputReserve: bigint) {
        super('INVALID_RESERVES', `Invalid reserves: input ${inputReserve}, output ${outputReserve}`);
    }
}

export class InsufficientTokenOfferError extends PoolError {
    readonly offered: bigint;
    readonly required: bigint;

    constructor(offered: bigint, required: bigint) {
        super('INSUFFICIENT_TOKEN_OFFER', `Insufficient token offer: offered ${offered}, required ${required}`);
        this.offered = offered;
        this.required = required;
    }
}

export class SlippageExceededError extends PoolError {
    readonly amountOut: bigint;
    readonly minAmountOut: bigint;

    constructor(amountOut: bigint, minAmountOut: bigint) {
        super('SLIPPAGE_EXCEEDED', `Slippage exceeded. Min: ${minAmountOut}, got: ${amountOut}`);
        this.amountOut = amountOut;
        this.minAmountOut = minAmountOut;
    }
}

export class InvalidAmountError extends PoolError {
    constructor(what: string, got: bigint | string, requirement: string = 'must be positive') {
        super('INVALID_AMOUNT', `${what} ${requirement}, got ${got}`);
    }
}

export class TransferFailedError extends PoolError {
    constructor(reason: string) {
        super('TRANSFER_FAILED', `Transfer failed: ${reason}`);
    }
}

export class DivideByZeroError extends PoolError {
    constructor() {
        super('DIVIDE_BY_ZERO', 'Division by zero');
    }
}

export class UnderflowError extends PoolError {
    constructor(a: bigint, b: bigint) {
        super('UNDERFLOW', `Underflow: ${a} - ${b}`);
    }
}

export function isPoolError(error: unknown): error is PoolError {
    return error instanceof PoolError;
}
