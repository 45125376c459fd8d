/**
 * core/ErrorCodes.ts
 *
 * Dictionary of the `ERR <code>` tokens documented for upsd.
 * The server may send codes that are not listed here; they pass through untouched.
 */

export enum NutErrorCode {
    // --- Access / Session ---
    ACCESS_DENIED = 'ACCESS-DENIED',
    USERNAME_REQUIRED = 'USERNAME-REQUIRED',
    PASSWORD_REQUIRED = 'PASSWORD-REQUIRED',
    INVALID_USERNAME = 'INVALID-USERNAME',
    INVALID_PASSWORD = 'INVALID-PASSWORD',
    ALREADY_SET_USERNAME = 'ALREADY-SET-USERNAME',
    ALREADY_SET_PASSWORD = 'ALREADY-SET-PASSWORD',
    ALREADY_LOGGED_IN = 'ALREADY-LOGGED-IN',
    ALREADY_SSL_MODE = 'ALREADY-SSL-MODE',
    FEATURE_NOT_SUPPORTED = 'FEATURE-NOT-SUPPORTED',
    FEATURE_NOT_CONFIGURED = 'FEATURE-NOT-CONFIGURED',

    // --- Request ---
    UNKNOWN_UPS = 'UNKNOWN-UPS',
    VAR_NOT_SUPPORTED = 'VAR-NOT-SUPPORTED',
    CMD_NOT_SUPPORTED = 'CMD-NOT-SUPPORTED',
    INVALID_ARGUMENT = 'INVALID-ARGUMENT',
    INVALID_VALUE = 'INVALID-VALUE',
    READONLY = 'READONLY',
    TOO_LONG = 'TOO-LONG',
    UNKNOWN_COMMAND = 'UNKNOWN-COMMAND',
    SET_FAILED = 'SET-FAILED',
    INSTCMD_FAILED = 'INSTCMD-FAILED',

    // --- Driver state (usually temporary) ---
    DATA_STALE = 'DATA-STALE',
    DRIVER_NOT_CONNECTED = 'DRIVER-NOT-CONNECTED',
}

/**
 * Human-readable descriptions, keyed by the raw wire code.
 */
export const NutErrorMessages: Record<string, string> = {
    'ACCESS-DENIED': 'Access denied: the credentials are wrong or lack the required rights.',
    'USERNAME-REQUIRED': 'A USERNAME must be sent before this command.',
    'PASSWORD-REQUIRED': 'A PASSWORD must be sent before this command.',
    'INVALID-USERNAME': 'The username is not valid for this server.',
    'INVALID-PASSWORD': 'The password is not valid for this server.',
    'ALREADY-SET-USERNAME': 'A username was already sent on this connection.',
    'ALREADY-SET-PASSWORD': 'A password was already sent on this connection.',
    'ALREADY-LOGGED-IN': 'This connection is already attached to the UPS.',
    'ALREADY-SSL-MODE': 'TLS is already active on this connection.',
    'FEATURE-NOT-SUPPORTED': 'The server was built without this feature.',
    'FEATURE-NOT-CONFIGURED': 'The server supports this feature but it is not configured.',
    'UNKNOWN-UPS': 'The UPS name is not known to the server.',
    'VAR-NOT-SUPPORTED': 'The UPS does not provide this variable.',
    'CMD-NOT-SUPPORTED': 'The UPS does not provide this instant command.',
    'INVALID-ARGUMENT': 'The command arguments are malformed.',
    'INVALID-VALUE': 'The value is not accepted for this variable.',
    'READONLY': 'The variable is read-only.',
    'TOO-LONG': 'The value exceeds the maximum length of this variable.',
    'UNKNOWN-COMMAND': 'The server does not recognise this command.',
    'SET-FAILED': 'The driver failed to set the variable.',
    'INSTCMD-FAILED': 'The driver failed to run the instant command.',
    'DATA-STALE': 'The driver has not refreshed its data recently.',
    'DRIVER-NOT-CONNECTED': 'The server has lost contact with the UPS driver.',
};

/**
 * Codes that describe a transient driver state; the same request may succeed later.
 */
export function isRetryableCode(code: string): boolean {
    return [
        NutErrorCode.DATA_STALE,
        NutErrorCode.DRIVER_NOT_CONNECTED,
    ].some(known => known === code);
}
