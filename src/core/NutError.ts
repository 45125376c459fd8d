/**
 * core/NutError.ts
 *
 * Error taxonomy for upsd interactions.
 * Features:
 * - One subclass per failure family (connect, auth, server, protocol, transport).
 * - `isFatal` tells callers whether the session survived the failure.
 * - Operation context (UPS, variable, command) attached by the client facade.
 * - JSON serialization support.
 */
import { NutErrorMessages, isRetryableCode } from './ErrorCodes';

/**
 * Details the client facade adds before an error reaches the caller.
 */
export interface NutErrorContext {
    operation?: string;
    ups?: string;
    variable?: string;
    command?: string;
}

export class NutError extends Error {
    public readonly isNutError = true;
    public readonly timestamp: Date;
    public context: NutErrorContext = {};

    constructor(message: string, public readonly wireCommand?: string) {
        super(message);
        this.name = 'NutError';
        this.timestamp = new Date();

        // Fix for extending built-ins in TypeScript/ES6
        Object.setPrototypeOf(this, new.target.prototype);
    }

    /** True when the session that raised this error has been closed. */
    get isFatal(): boolean {
        return false;
    }

    /**
     * Merges operation context into the error and refreshes the message.
     * Returns the same instance so callers can `throw err.withContext(...)`.
     */
    public withContext(context: NutErrorContext): this {
        this.context = { ...this.context, ...context };

        const parts = Object.entries(this.context)
            .filter(([, value]) => value !== undefined)
            .map(([key, value]) => `${key}=${value}`);

        const base = this.message.replace(/ \[[^\]]*\]$/, '');
        this.message = parts.length > 0 ? `${base} [${parts.join(', ')}]` : base;
        return this;
    }

    /**
     * Plain representation for logging systems (DataDog, Sentry, etc.)
     */
    public toJSON() {
        return {
            errorType: this.name,
            message: this.message,
            command: this.wireCommand,
            context: this.context,
            isFatal: this.isFatal,
            timestamp: this.timestamp,
        };
    }
}

/** The transport could not be established (refused, unreachable, DNS, spawn failure). */
export class NutConnectError extends NutError {
    constructor(message: string, public readonly originalError?: Error) {
        super(message);
        this.name = 'NutConnectError';
    }

    get isFatal(): boolean {
        return true;
    }
}

/**
 * Login was rejected, or a privileged operation was attempted without logging in.
 * The session stays usable for read-only commands.
 */
export class NutAuthError extends NutError {
    constructor(message: string, public readonly code?: string, wireCommand?: string) {
        super(message, wireCommand);
        this.name = 'NutAuthError';
    }
}

/**
 * The server answered `ERR <code>` to a well-formed request.
 */
export class NutServerError extends NutError {
    constructor(
        public readonly code: string,
        wireCommand?: string,
        public readonly detail?: string
    ) {
        // Format: "upsd ERR UNKNOWN-UPS (LIST VAR bogus) -> The UPS name is not known to the server."
        const description = NutErrorMessages[code] || 'Unknown error code';
        super(`upsd ERR ${code}${wireCommand ? ` (${wireCommand})` : ''} -> ${description}`, wireCommand);
        this.name = 'NutServerError';
    }

    get isAccessDenied(): boolean {
        return this.code === 'ACCESS-DENIED';
    }

    get isUnknownUps(): boolean {
        return this.code === 'UNKNOWN-UPS';
    }

    get isVarNotSupported(): boolean {
        return this.code === 'VAR-NOT-SUPPORTED';
    }

    /** True if the driver state is likely temporary (stale data, driver reconnecting) */
    get isRetryable(): boolean {
        return isRetryableCode(this.code);
    }

    public toJSON() {
        return {
            ...super.toJSON(),
            code: this.code,
            detail: this.detail,
            isRetryable: this.isRetryable,
        };
    }
}

/**
 * Response framing broke the protocol contract. The byte stream can no longer be
 * matched to logical frames, so the session is closed.
 */
export class NutProtocolError extends NutError {
    constructor(message: string, wireCommand?: string) {
        super(message, wireCommand);
        this.name = 'NutProtocolError';
    }

    get isFatal(): boolean {
        return true;
    }
}

export class NutTimeoutError extends NutError {
    constructor(public readonly timeoutMs: number, wireCommand?: string) {
        super(`No response from upsd within ${timeoutMs}ms`, wireCommand);
        this.name = 'NutTimeoutError';
    }

    get isFatal(): boolean {
        return true;
    }
}

export class NutIOError extends NutError {
    constructor(message: string, public readonly originalError?: Error) {
        super(message);
        this.name = 'NutIOError';
    }

    get isFatal(): boolean {
        return true;
    }
}

/** The stream ended (server hung up, helper process exited, or the transport was closed). */
export class NutEOFError extends NutError {
    constructor(message: string = 'Connection closed by peer') {
        super(message);
        this.name = 'NutEOFError';
    }

    get isFatal(): boolean {
        return true;
    }
}

export class NutClosedError extends NutError {
    constructor(message: string = 'Session is closed. Open a new connection.') {
        super(message);
        this.name = 'NutClosedError';
    }

    get isFatal(): boolean {
        return true;
    }
}

/** An argument cannot be carried on one protocol line (it contains CR or LF). */
export class NutArgumentError extends NutError {
    constructor(message: string) {
        super(message);
        this.name = 'NutArgumentError';
    }
}
