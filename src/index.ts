/**
 * nut-interface
 * ==========================================
 * Promise-based client for Network UPS Tools servers (upsd) in Node.js.
 *
 * The library speaks the NUT text protocol over a TCP socket (optionally upgraded with
 * STARTTLS) or through a netcat-compatible helper process, and returns typed results
 * and typed errors.
 *
 * @packageDocumentation
 * @module nut-interface
 */

// ===============================================
// 1. MAIN CLIENTS (Primary Entry Points)
// ===============================================

/**
 * The main client class.
 * Holds one connection to upsd and exposes every query and command.
 */
export { NutClient, resolveClientOptions } from './client/NutClient';
export type { NutClientOptions, ResolvedNutClientOptions } from './client/NutClient';

/**
 * Connection Pool.
 * Several independent connections to the same upsd, handed out round-robin.
 */
export { NutPool } from './client/NutPool';
export type { PoolOptions } from './client/NutPool';

/**
 * The session engine: framing, authentication and serialization of exchanges.
 * Use it directly for commands the client does not wrap.
 */
export { NutSession, SessionState } from './client/NutSession';
export type { NutSessionOptions } from './client/NutSession';

// ===============================================
// 2. ERRORS
// ===============================================

export {
    NutError,
    NutConnectError,
    NutAuthError,
    NutServerError,
    NutProtocolError,
    NutTimeoutError,
    NutIOError,
    NutEOFError,
    NutClosedError,
    NutArgumentError,
} from './core/NutError';
export type { NutErrorContext } from './core/NutError';
export { NutErrorCode, NutErrorMessages, isRetryableCode } from './core/ErrorCodes';

// ===============================================
// 3. CORE CONFIGURATION & TYPES
// ===============================================

export { CircuitBreaker, CircuitBreakerState } from './core/CircuitBreaker';
export type { CircuitBreakerOptions } from './core/CircuitBreaker';
export { Auth } from './core/Auth';
export type { NutCredentials } from './core/Auth';
export type { NutLogger } from './core/Logger';
export * from './types';

// ===============================================
// 4. LOW-LEVEL COMPONENTS
// ===============================================

export { NutProtocol } from './core/NutProtocol';
export type {
    NutCommand,
    ResponseLine,
    OkLine,
    ErrorLine,
    DataLine,
    ListBeginLine,
    ListEndLine,
} from './core/NutProtocol';
export { ResultParser } from './client/ResultParser';
export { createTransport, DEFAULT_PORT, DEFAULT_TIMEOUT } from './core/Transport';
export type {
    Transport,
    TransportKind,
    TransportOptions,
    NutEndpoint,
    TlsUpgradeOptions,
} from './core/Transport';
export { SocketTransport } from './core/SocketTransport';
export type { SocketTransportOptions } from './core/SocketTransport';
export { ProcessTransport } from './core/ProcessTransport';
export type { ProcessTransportOptions } from './core/ProcessTransport';
export { LineReader } from './core/LineReader';
export * from './utils/Helpers';
