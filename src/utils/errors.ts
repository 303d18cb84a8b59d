// src/utils/errors.ts

export class StreamError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StreamError';
    }
}

/** The requested bytes did not arrive within the read timeout. */
export class ReadTimeoutError extends StreamError {
    constructor(
        readonly requested: number,
        readonly timeoutMs: number,
    ) {
        super(`Timed out after ${timeoutMs} ms waiting for ${requested} bytes`);
        this.name = 'ReadTimeoutError';
    }
}

export class ConnectionClosedError extends StreamError {
    constructor(message = 'Connection closed', options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConnectionClosedError';
    }
}

export class NotConnectedError extends StreamError {
    constructor() {
        super('Receiver is not connected');
        this.name = 'NotConnectedError';
    }
}

/** Fatal for the current frame: the connection state should be treated as suspect. */
export class FramingError extends StreamError {
    constructor(
        reason: string,
        readonly offset: number = -1,
        options?: { cause?: unknown },
    ) {
        super(offset >= 0 ? `${reason} at offset ${offset}` : reason, options);
        this.name = 'FramingError';
    }
}
