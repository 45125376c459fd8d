import * as net from 'net';
import * as tls from 'tls';
import { LineReader } from './LineReader';
import { NutConnectError, NutEOFError, NutIOError } from './NutError';
import type { TlsUpgradeOptions, Transport } from './Transport';

/**
 * Configuration options for the Socket Transport.
 */
export interface SocketTransportOptions {
    /** Target IP address or Hostname */
    host: string;
    /** Target Port (default: 3493) */
    port: number;
    /** Connection timeout in seconds (default: 5) */
    timeout?: number;
    /** Enable TCP Keep-Alive to prevent idle disconnects (default: true) */
    keepAlive?: boolean;
}

/**
 * Low-level TCP/TLS transport.
 * Responsibilities:
 * 1. Connection: Opens the plain TCP socket upsd listens on, and upgrades it in place
 *    after a successful STARTTLS.
 * 2. Event Handling: Maps socket errors, closures, and handshake timeouts to NutErrors.
 * 3. Framing: Feeds received text into a LineReader.
 */
export class SocketTransport implements Transport {
    private socket: net.Socket | tls.TLSSocket | null = null;
    private readonly options: SocketTransportOptions;
    private reader: LineReader = new LineReader();

    constructor(options: SocketTransportOptions) {
        this.options = {
            ...options,
            timeout: options.timeout ?? 5,
            keepAlive: options.keepAlive ?? true,
        };
    }

    public get isOpen(): boolean {
        return this.socket !== null && !this.socket.destroyed && !this.reader.ended;
    }

    /**
     * Establishes the TCP connection.
     * @returns Promise that resolves when the socket is connected.
     */
    public open(): Promise<void> {
        return new Promise((resolve, reject) => {
            if (this.isOpen) return resolve();

            // 1. Clean up any previous socket instance
            this.cleanup();

            const { host, port } = this.options;
            const timeoutMs = (this.options.timeout || 5) * 1000;
            const socket = new net.Socket();
            this.socket = socket;

            socket.setEncoding('utf8');
            socket.setTimeout(timeoutMs);

            // 2. Handshake phase: timeouts and errors reject the open
            const onTimeout = () => {
                socket.destroy();
                reject(new NutConnectError(`Connection to ${host}:${port} timed out after ${this.options.timeout} seconds`));
            };
            const onError = (err: Error) => {
                socket.destroy();
                reject(new NutConnectError(`Cannot connect to ${host}:${port}: ${err.message}`, err));
            };

            socket.once('timeout', onTimeout);
            socket.once('error', onError);

            socket.once('connect', () => {
                socket.removeListener('timeout', onTimeout);
                socket.removeListener('error', onError);

                // Clear initial timeout; reads carry their own deadline
                socket.setTimeout(0);
                socket.setNoDelay(true);
                if (this.options.keepAlive) socket.setKeepAlive(true, 10000);

                this.bind(socket);
                resolve();
            });

            socket.connect(port, host);
        });
    }

    public writeLine(line: string): Promise<void> {
        return new Promise((resolve, reject) => {
            const socket = this.socket;
            if (!socket || socket.destroyed) {
                return reject(new NutIOError('Socket is not connected. Call open() first.'));
            }

            socket.write(`${line}\n`, 'utf8', (err) => {
                if (err) reject(new NutIOError(`Write failed: ${err.message}`, err));
                else resolve();
            });
        });
    }

    public readLine(timeoutMs: number): Promise<string> {
        return this.reader.next(timeoutMs);
    }

    /**
     * Wraps the live socket with TLS. Must be called right after upsd answered
     * `OK STARTTLS`, while no other data is in flight.
     */
    public upgradeToTls(options: TlsUpgradeOptions = {}): Promise<void> {
        return new Promise((resolve, reject) => {
            const plain = this.socket;
            if (!plain || plain.destroyed) {
                return reject(new NutIOError('Socket is not connected. Call open() first.'));
            }
            if (plain instanceof tls.TLSSocket) {
                return reject(new NutConnectError('TLS is already active on this connection'));
            }

            plain.removeAllListeners('data');

            const secure = tls.connect({
                socket: plain,
                servername: options.servername ?? this.options.host,
                rejectUnauthorized: options.rejectUnauthorized ?? false,
                ca: options.ca,
            });
            secure.setEncoding('utf8');

            const onError = (err: Error) => {
                this.close();
                reject(new NutConnectError(`TLS handshake with ${this.options.host} failed: ${err.message}`, err));
            };
            secure.once('error', onError);

            secure.once('secureConnect', () => {
                secure.removeListener('error', onError);
                this.socket = secure;
                this.bind(secure);
                resolve();
            });
        });
    }

    /**
     * Releases the socket. Safe to call any number of times.
     */
    public close(): void {
        this.reader.end(new NutEOFError('Transport closed'));
        if (this.socket) {
            this.socket.destroy();
            this.socket = null;
        }
    }

    private bind(socket: net.Socket | tls.TLSSocket): void {
        const reader = this.reader;

        socket.on('data', (chunk: string | Buffer) => {
            reader.push(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
        });

        socket.on('error', (err: Error) => {
            reader.end(new NutIOError(`Socket error: ${err.message}`, err));
        });

        socket.on('close', () => {
            reader.end(new NutEOFError());
        });
    }

    private cleanup(): void {
        if (this.socket) {
            this.socket.removeAllListeners();
            this.socket.destroy();
            this.socket = null;
        }
        this.reader = new LineReader();
    }
}
