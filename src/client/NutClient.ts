import * as dotenv from 'dotenv';
import { EventEmitter } from 'events';
import { Auth, NutCredentials } from '../core/Auth';
import { CircuitBreaker, CircuitBreakerOptions } from '../core/CircuitBreaker';
import { NutLogger, scopedLogger } from '../core/Logger';
import {
    NutAuthError,
    NutClosedError,
    NutError,
    NutErrorContext,
    NutProtocolError,
} from '../core/NutError';
import { NutProtocol } from '../core/NutProtocol';
import { DEFAULT_PORT, DEFAULT_TIMEOUT, NutEndpoint, TransportKind } from '../core/Transport';
import { UpsStatus, VarRange } from '../types';
import { parseBoolean, parseNumeric } from '../utils/Helpers';
import { NutSession, NutSessionOptions } from './NutSession';
import { ResultParser } from './ResultParser';

// Load environment variables immediately
dotenv.config();

export interface NutClientOptions extends NutSessionOptions {
    /** upsd host (default: '127.0.0.1') */
    host?: string;
    /** upsd port (default: 3493) */
    port?: number;
    /** Response timeout in seconds (default: 5) */
    timeout?: number;
    /**
     * upsd username. Without credentials the client stays read-only.
     */
    username?: string;
    password?: string;
    /**
     * When true (default) one connection is opened by `connect()` and held.
     * When false every operation opens, authenticates, runs and closes its own connection.
     */
    persistent?: boolean;
    /** Issue STARTTLS right after connecting (default: false) */
    useTLS?: boolean;
    /** If false, allows self-signed certificates (default: false) */
    rejectUnauthorized?: boolean;
    /**
     * Set to true to silence the advisory printed when credentials are passed in code
     * instead of the environment.
     */
    allowInsecureConfig?: boolean;
    /**
     * Configuration for the Circuit Breaker guarding connection attempts.
     */
    circuitBreaker?: CircuitBreakerOptions;
}

export interface ResolvedNutClientOptions extends NutClientOptions {
    host: string;
    port: number;
    timeout: number;
    persistent: boolean;
    transport: TransportKind;
    debug: boolean;
}

/**
 * Merges environment variables and constructor options.
 * Environment variables win: `NUT_HOST`, `NUT_PORT`, `NUT_USER`, `NUT_PASS`,
 * `NUT_TIMEOUT`, `NUT_TRANSPORT`, `NUT_DEBUG`.
 */
export function resolveClientOptions(
    options: NutClientOptions = {},
    env: NodeJS.ProcessEnv = process.env
): ResolvedNutClientOptions {
    const envTransport = env.NUT_TRANSPORT === 'socket' || env.NUT_TRANSPORT === 'process'
        ? env.NUT_TRANSPORT
        : undefined;
    const envDebug = env.NUT_DEBUG === '1' ? true
        : env.NUT_DEBUG === '0' ? false
        : parseBoolean(env.NUT_DEBUG ?? '') ?? undefined;

    return {
        ...options,
        host: env.NUT_HOST || options.host || '127.0.0.1',
        port: parseNumeric(env.NUT_PORT) ?? options.port ?? DEFAULT_PORT,
        timeout: parseNumeric(env.NUT_TIMEOUT) ?? options.timeout ?? DEFAULT_TIMEOUT,
        username: env.NUT_USER || options.username,
        password: env.NUT_PASS || options.password,
        transport: envTransport ?? options.transport ?? 'socket',
        persistent: options.persistent ?? true,
        debug: envDebug ?? options.debug ?? false,
    };
}

export declare interface NutClient {
    on(event: 'ready', listener: () => void): this;
    on(event: 'close', listener: () => void): this;
}

/**
 * NutClient
 * The public facade over a upsd connection.
 *
 * Every operation is one or more session round trips whose rows are reshaped by
 * `ResultParser`. Errors are never swallowed: they reach the caller with the
 * operation, UPS and variable attached (`err.context`).
 *
 * @example
 * const client = new NutClient({ host: '192.168.1.10', username: 'monitor', password: 'test-secret' });
 * await client.connect();
 * const ups = await client.listUps();            // Map { 'myups' => 'Rack UPS' }
 * const charge = await client.getVar('myups', 'battery.charge');
 * await client.logout();
 */
export class NutClient extends EventEmitter {
    private readonly options: ResolvedNutClientOptions;
    private readonly isConfigFromEnv: boolean;
    private readonly breaker: CircuitBreaker;
    private readonly logger: NutLogger;
    private credentials: NutCredentials | null;
    private session: NutSession | null = null;
    private connecting: Promise<void> | null = null;

    constructor(options: NutClientOptions = {}, env: NodeJS.ProcessEnv = process.env) {
        super();

        this.options = resolveClientOptions(options, env);
        this.isConfigFromEnv = !!(env.NUT_USER && env.NUT_PASS);
        this.logger = scopedLogger('NutClient', this.options.logger, this.options.debug);
        this.breaker = new CircuitBreaker(this.options.circuitBreaker, this.options.logger);

        const { username, password } = this.options;
        this.credentials = username !== undefined && password !== undefined
            ? { username, password }
            : null;

        // Security Audit
        if (this.credentials && !this.isConfigFromEnv && !this.options.allowInsecureConfig) {
            this.printSeriousWarning();
        }

        this.logger.debug(
            `Configured for ${this.options.host}:${this.options.port} ` +
            `(user: ${this.credentials ? this.credentials.username : '<none>'}, ` +
            `password: ${Auth.mask(this.credentials?.password)})`
        );
    }

    /**
     * Connects, runs `fn`, and disconnects whatever happens inside it.
     */
    public static async using<T>(options: NutClientOptions, fn: (client: NutClient) => Promise<T>): Promise<T> {
        const client = new NutClient(options);
        try {
            await client.connect();
            return await fn(client);
        } finally {
            client.disconnect();
        }
    }

    public get endpoint(): NutEndpoint {
        return { host: this.options.host, port: this.options.port, timeout: this.options.timeout };
    }

    public get isConnected(): boolean {
        return this.session !== null && !this.session.isClosed;
    }

    public get isAuthenticated(): boolean {
        return this.session !== null && this.session.isAuthenticated;
    }

    // ========================================================
    // CONNECTION LIFECYCLE
    // ========================================================

    /**
     * Opens the persistent connection: transport, optional STARTTLS, and login when
     * credentials are configured. A no-op for non-persistent clients, which connect
     * per operation.
     */
    public async connect(): Promise<void> {
        if (!this.options.persistent || this.isConnected) return;

        // Overlapping calls share one attempt
        if (!this.connecting) {
            this.connecting = this.openSession()
                .then(session => {
                    this.session = session;
                    this.emit('ready');
                })
                .finally(() => {
                    this.connecting = null;
                });
        }
        return this.connecting;
    }

    /**
     * Authenticates the current connection. For non-persistent clients the credentials
     * are stored and used by every following operation.
     */
    public async login(credentials?: NutCredentials): Promise<void> {
        const creds = credentials ?? this.credentials;
        if (!creds) {
            throw new NutAuthError('No credentials configured').withContext({ operation: 'login' });
        }

        if (!this.options.persistent) {
            this.credentials = creds;
            return;
        }

        await this.run({ operation: 'login' }, session => session.login(creds));
        this.credentials = creds;
    }

    /**
     * Sends LOGOUT and closes the connection.
     */
    public async logout(): Promise<void> {
        if (!this.options.persistent) return;

        await this.run({ operation: 'logout' }, async session => {
            await session.executeOk(NutProtocol.command('LOGOUT'));
        });
        this.disconnect();
    }

    /**
     * Closes the connection without a round trip. Safe to call any number of times.
     */
    public disconnect(): void {
        const session = this.session;
        if (!session) return;

        this.session = null;
        session.close();
        this.emit('close');
    }

    // ========================================================
    // SERVER INFORMATION
    // ========================================================

    public help(): Promise<string> {
        return this.run({ operation: 'help' }, async session =>
            ResultParser.toPlainText(await session.execute(NutProtocol.command('HELP')))
        );
    }

    public version(): Promise<string> {
        return this.run({ operation: 'version' }, async session =>
            ResultParser.toPlainText(await session.execute(NutProtocol.command('VER')))
        );
    }

    // ========================================================
    // LISTS
    // ========================================================

    /**
     * UPS name → description, in server order.
     */
    public listUps(): Promise<Map<string, string>> {
        return this.run({ operation: 'listUps' }, async session => {
            const rows = await session.executeList(NutProtocol.command('LIST', 'UPS'));
            return ResultParser.toMapping(rows, 'UPS');
        });
    }

    /**
     * Variable name → value for every variable of `ups`.
     */
    public listVars(ups: string): Promise<Map<string, string>> {
        return this.run({ operation: 'listVars', ups }, async session => {
            const rows = await session.executeList(NutProtocol.command('LIST', 'VAR', ups));
            return ResultParser.toMapping(rows, 'VAR', [ups]);
        });
    }

    /**
     * Writable variables of `ups` with their current values.
     */
    public listRwVars(ups: string): Promise<Map<string, string>> {
        return this.run({ operation: 'listRwVars', ups }, async session => {
            const rows = await session.executeList(NutProtocol.command('LIST', 'RW', ups));
            return ResultParser.toMapping(rows, 'RW', [ups]);
        });
    }

    /**
     * Instant command name → description. Descriptions come from one
     * `GET CMDDESC` per command on the same connection.
     */
    public listCommands(ups: string): Promise<Map<string, string>> {
        return this.run({ operation: 'listCommands', ups }, async session => {
            const rows = await session.executeList(NutProtocol.command('LIST', 'CMD', ups));
            const commands = new Map<string, string>();

            for (const name of ResultParser.toList(rows, 'CMD', [ups])) {
                const desc = await session.execute(NutProtocol.command('GET', 'CMDDESC', ups, name));
                commands.set(name, ResultParser.toValue(desc, 'CMDDESC', [ups, name]));
            }

            return commands;
        });
    }

    /**
     * Hosts attached to `ups` (upsmon clients).
     */
    public listClients(ups: string): Promise<string[]> {
        return this.run({ operation: 'listClients', ups }, async session => {
            const rows = await session.executeList(NutProtocol.command('LIST', 'CLIENT', ups));
            return ResultParser.toList(rows, 'CLIENT', [ups]);
        });
    }

    /**
     * Accepted values of an enumerated variable.
     */
    public listEnum(ups: string, variable: string): Promise<string[]> {
        return this.run({ operation: 'listEnum', ups, variable }, async session => {
            const rows = await session.executeList(NutProtocol.command('LIST', 'ENUM', ups, variable));
            return ResultParser.toList(rows, 'ENUM', [ups, variable]);
        });
    }

    /**
     * Accepted ranges of a ranged variable.
     */
    public listRange(ups: string, variable: string): Promise<VarRange[]> {
        return this.run({ operation: 'listRange', ups, variable }, async session => {
            const rows = await session.executeList(NutProtocol.command('LIST', 'RANGE', ups, variable));
            return ResultParser.toRanges(rows, [ups, variable]);
        });
    }

    // ========================================================
    // SINGLE VALUES
    // ========================================================

    public getVar(ups: string, variable: string): Promise<string> {
        return this.run({ operation: 'getVar', ups, variable }, async session => {
            const rows = await session.execute(NutProtocol.command('GET', 'VAR', ups, variable));
            return ResultParser.toValue(rows, 'VAR', [ups, variable]);
        });
    }

    /**
     * Type flags of a variable, e.g. `RW STRING:64` or `ENUM`.
     */
    public getVarType(ups: string, variable: string): Promise<string> {
        return this.run({ operation: 'getVarType', ups, variable }, async session => {
            const rows = await session.execute(NutProtocol.command('GET', 'TYPE', ups, variable));
            return ResultParser.toText(rows, 'TYPE', [ups, variable]);
        });
    }

    public getVarDescription(ups: string, variable: string): Promise<string> {
        return this.run({ operation: 'getVarDescription', ups, variable }, async session => {
            const rows = await session.execute(NutProtocol.command('GET', 'DESC', ups, variable));
            return ResultParser.toValue(rows, 'DESC', [ups, variable]);
        });
    }

    public getUpsDescription(ups: string): Promise<string> {
        return this.run({ operation: 'getUpsDescription', ups }, async session => {
            const rows = await session.execute(NutProtocol.command('GET', 'UPSDESC', ups));
            return ResultParser.toValue(rows, 'UPSDESC', [ups]);
        });
    }

    public getCommandDescription(ups: string, command: string): Promise<string> {
        return this.run({ operation: 'getCommandDescription', ups, command }, async session => {
            const rows = await session.execute(NutProtocol.command('GET', 'CMDDESC', ups, command));
            return ResultParser.toValue(rows, 'CMDDESC', [ups, command]);
        });
    }

    /**
     * Number of clients attached to `ups` with LOGIN.
     */
    public getNumLogins(ups: string): Promise<number> {
        return this.run({ operation: 'getNumLogins', ups }, async session => {
            const rows = await session.execute(NutProtocol.command('GET', 'NUMLOGINS', ups));
            const value = ResultParser.toValue(rows, 'NUMLOGINS', [ups]);
            const count = parseNumeric(value);

            if (count === undefined || !Number.isInteger(count)) {
                throw new NutProtocolError(`NUMLOGINS is not an integer: "${value}"`);
            }
            return count;
        });
    }

    /**
     * Typed snapshot (status flags, charge, runtime, load, voltages) from one `LIST VAR`.
     */
    public async getStatus(ups: string): Promise<UpsStatus> {
        const variables = await this.listVars(ups);
        return ResultParser.toStatus(ups, variables);
    }

    // ========================================================
    // PRIVILEGED OPERATIONS
    // ========================================================

    /**
     * Sets a writable variable. Requires a successful login; the check happens
     * before anything is written.
     */
    public async setVar(ups: string, variable: string, value: string): Promise<void> {
        await this.run({ operation: 'setVar', ups, variable }, async session => {
            await session.executeOk(NutProtocol.command('SET', 'VAR', ups, variable, value));
        }, true);
    }

    /**
     * Runs an instant command (`INSTCMD`), optionally with a parameter.
     */
    public async runCommand(ups: string, command: string, value?: string): Promise<void> {
        const args = value === undefined ? [ups, command] : [ups, command, value];

        await this.run({ operation: 'runCommand', ups, command }, async session => {
            await session.executeOk(NutProtocol.command('INSTCMD', ...args));
        }, true);
    }

    /**
     * Registers this connection as a client of `ups` (`LOGIN <ups>`).
     */
    public async attach(ups: string): Promise<void> {
        await this.run({ operation: 'attach', ups }, async session => {
            await session.executeOk(NutProtocol.command('LOGIN', ups));
        }, true);
    }

    /**
     * Claims primary rights on `ups` (`MASTER`) and raises the forced-shutdown flag (`FSD`).
     */
    public async forcedShutdown(ups: string): Promise<void> {
        await this.run({ operation: 'forcedShutdown', ups }, async session => {
            await session.executeOk(NutProtocol.command('MASTER', ups));
            this.logger.warn(`Forced shutdown requested for ${ups}`);
            await session.executeOk(NutProtocol.command('FSD', ups));
        }, true);
    }

    // ========================================================
    // PRIVATE HELPERS
    // ========================================================

    /**
     * Transport, optional STARTTLS and login, guarded by the circuit breaker.
     * Only connection-level failures count against the host.
     */
    private openSession(): Promise<NutSession> {
        return this.breaker.execute(async () => {
            const session = await NutSession.connect(this.endpoint, this.options);

            try {
                if (this.options.useTLS) {
                    await session.startTls({ rejectUnauthorized: this.options.rejectUnauthorized });
                }
                if (this.credentials) {
                    await session.login(this.credentials);
                }
            } catch (err) {
                session.close();
                throw err;
            }

            return session;
        }, err => err instanceof NutError && err.isFatal);
    }

    /**
     * Runs `task` on the right session and attaches `context` to any NutError.
     * Fatal errors close the session; non-persistent sessions are always closed.
     */
    private async run<T>(
        context: NutErrorContext,
        task: (session: NutSession) => Promise<T>,
        privileged: boolean = false
    ): Promise<T> {
        let session: NutSession;

        try {
            session = await this.acquire(context, privileged);
        } catch (err) {
            throw err instanceof NutError ? err.withContext(context) : err;
        }

        try {
            return await task(session);
        } catch (err) {
            if (err instanceof NutError) {
                if (err.isFatal) this.invalidate(session);
                throw err.withContext(context);
            }
            throw err;
        } finally {
            if (!this.options.persistent) session.close();
        }
    }

    private async acquire(context: NutErrorContext, privileged: boolean): Promise<NutSession> {
        const operation = context.operation ?? 'operation';

        if (this.options.persistent) {
            if (!this.session || this.session.isClosed) {
                throw new NutClosedError('Client is not connected. Call connect() first.');
            }
            if (privileged) this.session.assertAuthenticated(operation);
            return this.session;
        }

        if (privileged && !this.credentials) {
            throw new NutAuthError(`${operation} requires a successful login`);
        }
        return this.openSession();
    }

    private invalidate(session: NutSession): void {
        session.close();
        if (this.session === session) {
            this.logger.warn(`Connection to ${this.options.host}:${this.options.port} is no longer usable`);
            this.disconnect();
        }
    }

    /**
     * Prints a highly visible warning banner through the logger.
     */
    private printSeriousWarning(): void {
        const border = '='.repeat(60);
        this.logger.warn(`\n\x1b[33m${border}\x1b[0m`);
        this.logger.warn('\x1b[43m\x1b[30m SERIOUS SECURITY ADVISORY \x1b[0m');
        this.logger.warn('\x1b[33mUsing hardcoded credentials. Please use .env file (NUT_USER / NUT_PASS).\x1b[0m');
        this.logger.warn(`\x1b[33m${border}\x1b[0m\n`);
    }
}
