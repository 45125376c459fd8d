import { SocketTransport } from './SocketTransport';
import { ProcessTransport } from './ProcessTransport';

/**
 * Where the upsd server lives.
 */
export interface NutEndpoint {
    /** Target IP address or Hostname */
    readonly host: string;
    /** Target Port (default: 3493) */
    readonly port: number;
    /** Response timeout in seconds (default: 5) */
    readonly timeout: number;
}

export const DEFAULT_PORT = 3493;
export const DEFAULT_TIMEOUT = 5;

export interface TlsUpgradeOptions {
    /** If false, allows self-signed certificates (default: false) */
    rejectUnauthorized?: boolean;
    /** Server name for SNI and certificate checks (default: endpoint host) */
    servername?: string;
    /** Extra CA certificates in PEM format */
    ca?: string | Buffer | Array<string | Buffer>;
}

/**
 * A single bidirectional line stream to upsd.
 * Implementations own the underlying socket or process and release it on `close()`.
 */
export interface Transport {
    readonly isOpen: boolean;

    open(): Promise<void>;

    /** Writes one line; the newline is appended by the transport. */
    writeLine(line: string): Promise<void>;

    /** Next complete line without its terminator. */
    readLine(timeoutMs: number): Promise<string>;

    /** Idempotent. Pending reads fail with `NutEOFError`. */
    close(): void;

    /** Present only on transports that can switch to TLS in place (STARTTLS). */
    upgradeToTls?(options: TlsUpgradeOptions): Promise<void>;
}

export type TransportKind = 'socket' | 'process';

export interface TransportOptions {
    /** Transport implementation (default: 'socket') */
    transport?: TransportKind;
    /** Helper executable for the process transport (default: `nc`, or `ncat` on Windows) */
    processCommand?: string;
    /** Arguments for the helper; `{host}` and `{port}` are substituted */
    processArgs?: string[];
    /** Milliseconds the helper must survive before the process transport counts as connected (default: 250) */
    processConnectGrace?: number;
    /** Enable TCP Keep-Alive on the socket transport (default: true) */
    keepAlive?: boolean;
}

/**
 * Builds the transport for `endpoint`. The choice is made here, once, and is invisible
 * to the session above.
 */
export function createTransport(endpoint: NutEndpoint, options: TransportOptions = {}): Transport {
    if (options.transport === 'process') {
        return new ProcessTransport({
            host: endpoint.host,
            port: endpoint.port,
            timeout: endpoint.timeout,
            command: options.processCommand,
            args: options.processArgs,
            connectGrace: options.processConnectGrace,
        });
    }

    return new SocketTransport({
        host: endpoint.host,
        port: endpoint.port,
        timeout: endpoint.timeout,
        keepAlive: options.keepAlive,
    });
}
