import { Auth, NutCredentials } from '../core/Auth';
import { NutLogger, scopedLogger } from '../core/Logger';
import {
    NutArgumentError,
    NutAuthError,
    NutClosedError,
    NutConnectError,
    NutEOFError,
    NutError,
    NutIOError,
    NutProtocolError,
    NutServerError,
    NutTimeoutError,
} from '../core/NutError';
import { DataLine, NutCommand, NutProtocol, OkLine, ResponseLine } from '../core/NutProtocol';
import {
    createTransport,
    NutEndpoint,
    TlsUpgradeOptions,
    Transport,
    TransportOptions,
} from '../core/Transport';
import { assertNever, hasPrefix } from '../utils/Helpers';

export enum SessionState {
    DISCONNECTED = 'disconnected',
    CONNECTED = 'connected',
    AUTHENTICATED = 'authenticated',
    CLOSED = 'closed',
}

export interface NutSessionOptions extends TransportOptions {
    /**
     * Builds the transport instead of `createTransport`. Used to plug in custom
     * or in-memory transports.
     */
    transportFactory?: (endpoint: NutEndpoint) => Transport;
    logger?: NutLogger;
    /** Log every command and response line (default: false) */
    debug?: boolean;
}

/**
 * NutSession
 * One conversation with upsd over one transport.
 *
 * Exchanges are strictly half-duplex: every call waits for the previous command's
 * terminal line (`OK`, `ERR`, or the matching `END LIST`) before writing. Any failure
 * that leaves the stream position unknown (framing violation, timeout, I/O error, EOF)
 * closes the session; later calls fail with `NutClosedError` without touching the wire.
 */
export class NutSession {
    private state: SessionState = SessionState.DISCONNECTED;
    private queue: Promise<void> = Promise.resolve();
    private readonly logger: NutLogger;

    private constructor(
        public readonly endpoint: NutEndpoint,
        private readonly transport: Transport,
        logger: NutLogger
    ) {
        this.logger = logger;
    }

    /**
     * Opens the transport and returns a connected session.
     * If opening fails the transport is released before the error propagates.
     */
    public static async connect(endpoint: NutEndpoint, options: NutSessionOptions = {}): Promise<NutSession> {
        const logger = scopedLogger('NutSession', options.logger, options.debug);
        const transport = options.transportFactory
            ? options.transportFactory(endpoint)
            : createTransport(endpoint, options);

        const session = new NutSession(Object.freeze({ ...endpoint }), transport, logger);

        try {
            await transport.open();
        } catch (err) {
            transport.close();
            session.state = SessionState.CLOSED;
            if (err instanceof NutError) throw err;
            throw new NutConnectError(`Cannot connect to ${endpoint.host}:${endpoint.port}: ${String(err)}`);
        }

        session.state = SessionState.CONNECTED;
        logger.debug(`Connected to ${endpoint.host}:${endpoint.port}`);
        return session;
    }

    public get currentState(): SessionState {
        return this.state;
    }

    public get isAuthenticated(): boolean {
        return this.state === SessionState.AUTHENTICATED;
    }

    public get isClosed(): boolean {
        return this.state === SessionState.CLOSED;
    }

    private get timeoutMs(): number {
        return this.endpoint.timeout * 1000;
    }

    /**
     * USERNAME then PASSWORD. A rejection raises `NutAuthError` and leaves the session
     * connected but unauthenticated.
     */
    public login(credentials: NutCredentials): Promise<void> {
        return this.exclusive(async () => {
            await this.authStep(NutProtocol.command('USERNAME', credentials.username));
            await this.authStep(NutProtocol.command('PASSWORD', credentials.password));

            this.state = SessionState.AUTHENTICATED;
            this.logger.debug(`Authenticated as ${credentials.username}`);
        });
    }

    /**
     * Single-line round trip. `OK` yields `[]`, a data line yields `[line]`.
     */
    public execute(command: NutCommand): Promise<DataLine[]> {
        return this.exclusive(async () => {
            const wire = Auth.describeCommand(command);
            const line = await this.send(command);

            switch (line.kind) {
                case 'ok':
                    return [];
                case 'data':
                    return [line];
                case 'error':
                    throw new NutServerError(line.code, wire, line.detail);
                case 'listBegin':
                case 'listEnd':
                    throw this.protocolViolation(`Unexpected list marker "${line.subject}"`, wire);
                default:
                    return assertNever(line);
            }
        });
    }

    /**
     * Round trip for commands whose only valid reply is `OK ...`.
     */
    public executeOk(command: NutCommand): Promise<OkLine> {
        return this.exclusive(async () => {
            const wire = Auth.describeCommand(command);
            const line = await this.send(command);

            switch (line.kind) {
                case 'ok':
                    return line;
                case 'error':
                    throw new NutServerError(line.code, wire, line.detail);
                case 'data':
                    throw this.protocolViolation(`Expected OK, got "${line.fields.join(' ')}"`, wire);
                case 'listBegin':
                case 'listEnd':
                    throw this.protocolViolation(`Unexpected list marker "${line.subject}"`, wire);
                default:
                    return assertNever(line);
            }
        });
    }

    /**
     * Multi-line round trip bracketed by `BEGIN LIST <subject>` / `END LIST <subject>`,
     * where the subject is the command's arguments (`LIST VAR ups` → `VAR ups`).
     * Every data line must start with the subject tokens.
     */
    public executeList(command: NutCommand): Promise<DataLine[]> {
        return this.exclusive(async () => {
            const wire = Auth.describeCommand(command);
            const subject = NutProtocol.listSubject(command);
            const first = await this.send(command);

            if (first.kind === 'error') {
                throw new NutServerError(first.code, wire, first.detail);
            }
            if (first.kind !== 'listBegin' || first.subject !== subject) {
                throw this.protocolViolation(`Expected "BEGIN LIST ${subject}"`, wire);
            }

            const rows: DataLine[] = [];

            for (;;) {
                const line = await this.readListLine(wire);

                switch (line.kind) {
                    case 'listEnd':
                        if (line.subject !== subject) {
                            throw this.protocolViolation(`"END LIST ${line.subject}" does not close "${subject}"`, wire);
                        }
                        return rows;
                    case 'data':
                        if (!hasPrefix(line.fields, command.args)) {
                            throw this.protocolViolation(`Row "${line.fields.join(' ')}" does not belong to "${subject}"`, wire);
                        }
                        rows.push(line);
                        break;
                    case 'listBegin':
                        throw this.protocolViolation(`Nested "BEGIN LIST ${line.subject}"`, wire);
                    case 'ok':
                    case 'error':
                        throw this.protocolViolation(`Unexpected "${line.kind}" inside "${subject}"`, wire);
                    default:
                        return assertNever(line);
                }
            }
        });
    }

    /**
     * STARTTLS, then switches the transport to TLS.
     */
    public startTls(options: TlsUpgradeOptions = {}): Promise<void> {
        return this.exclusive(async () => {
            const upgrade = this.transport.upgradeToTls?.bind(this.transport);
            if (!upgrade) {
                throw new NutError('This transport cannot be upgraded to TLS');
            }

            const command = NutProtocol.command('STARTTLS');
            const line = await this.send(command);

            if (line.kind === 'error') throw new NutServerError(line.code, 'STARTTLS', line.detail);
            if (line.kind !== 'ok') throw this.protocolViolation('Expected "OK STARTTLS"', 'STARTTLS');

            try {
                await upgrade(options);
            } catch (err) {
                this.close();
                throw err;
            }
            this.logger.debug('TLS active');
        });
    }

    /**
     * Guard for privileged operations. Throws before anything is written.
     */
    public assertAuthenticated(operation: string): void {
        this.assertOpen();
        if (this.state !== SessionState.AUTHENTICATED) {
            throw new NutAuthError(`${operation} requires a successful login`);
        }
    }

    /**
     * Closes the session and returns the error to throw.
     */
    private protocolViolation(message: string, wireCommand?: string): NutProtocolError {
        this.close();
        return new NutProtocolError(message, wireCommand);
    }

    /**
     * Releases the transport. Safe to call any number of times.
     */
    public close(): void {
        if (this.state === SessionState.CLOSED) return;
        this.state = SessionState.CLOSED;
        this.transport.close();
        this.logger.debug(`Closed connection to ${this.endpoint.host}:${this.endpoint.port}`);
    }

    // ========================================================
    // PRIVATE HELPERS
    // ========================================================

    private exclusive<T>(task: () => Promise<T>): Promise<T> {
        const run = this.queue.then(() => {
            this.assertOpen();
            return task();
        });
        this.queue = run.then(() => undefined, () => undefined);
        return run;
    }

    private assertOpen(): void {
        if (this.state === SessionState.CLOSED) throw new NutClosedError();
        if (this.state === SessionState.DISCONNECTED) throw new NutClosedError('Session is not connected');
    }

    private async authStep(command: NutCommand): Promise<void> {
        const wire = Auth.describeCommand(command);
        const line = await this.send(command);

        switch (line.kind) {
            case 'ok':
                return;
            case 'error':
                throw new NutAuthError(`${command.verb} rejected by upsd: ${line.code}`, line.code, wire);
            case 'data':
                throw this.protocolViolation(`Expected OK, got "${line.fields.join(' ')}"`, wire);
            case 'listBegin':
            case 'listEnd':
                throw this.protocolViolation(`Unexpected list marker "${line.subject}"`, wire);
            default:
                return assertNever(line);
        }
    }

    /**
     * Writes the command and decodes the first response line.
     */
    private async send(command: NutCommand): Promise<ResponseLine> {
        const wire = Auth.describeCommand(command);

        const unsafe = command.args.find(arg => !NutProtocol.isSafeArgument(arg));
        if (unsafe !== undefined) {
            throw new NutArgumentError(`Argument ${JSON.stringify(unsafe)} contains a line break`);
        }

        this.logger.debug(`>>> ${wire}`);

        try {
            await this.transport.writeLine(NutProtocol.encode(command));
            const raw = await this.transport.readLine(this.timeoutMs);
            this.logger.debug(`<<< ${raw}`);
            return NutProtocol.decode(raw);
        } catch (err) {
            throw this.transportFailure(err, wire);
        }
    }

    /**
     * Reads inside an open LIST block. Running out of stream here means the block
     * never closed.
     */
    private async readListLine(wire: string): Promise<ResponseLine> {
        try {
            const raw = await this.transport.readLine(this.timeoutMs);
            this.logger.debug(`<<< ${raw}`);
            return NutProtocol.decode(raw);
        } catch (err) {
            if (err instanceof NutTimeoutError || err instanceof NutEOFError) {
                throw this.protocolViolation(`Incomplete list: ${err.message}`, wire);
            }
            throw this.transportFailure(err, wire);
        }
    }

    private transportFailure(err: unknown, wire: string): NutError {
        let error: NutError;

        if (err instanceof NutTimeoutError) {
            error = new NutTimeoutError(err.timeoutMs, wire);
        } else if (err instanceof NutError) {
            error = err;
        } else {
            error = new NutIOError(err instanceof Error ? err.message : String(err));
        }

        this.logger.debug(`Transport failure on "${wire}": ${error.message}`);
        if (error.isFatal) this.close();
        return error;
    }
}
