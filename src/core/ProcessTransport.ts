import { spawn, ChildProcessWithoutNullStreams } from 'child_process';
import { LineReader } from './LineReader';
import { NutConnectError, NutEOFError, NutIOError } from './NutError';
import type { Transport } from './Transport';

export interface ProcessTransportOptions {
    host: string;
    port: number;
    /** Seconds to wait for the helper to start (default: 5) */
    timeout?: number;
    /** Helper executable (default: `nc`, or `ncat` on Windows) */
    command?: string;
    /** Helper arguments; `{host}` and `{port}` are substituted (default: `{host} {port}`) */
    args?: string[];
    /**
     * Milliseconds the helper must stay alive after starting before `open()` resolves,
     * unless it writes output first. An earlier exit fails with `NutConnectError`.
     * Default: 250
     */
    connectGrace?: number;
}

/**
 * ProcessTransport
 * Reaches upsd through a line-terminal helper (netcat-compatible) whose stdin/stdout
 * carry the protocol. Used where a direct socket is not an option.
 *
 * The transport owns the child process: `close()` kills it, and it is never shared.
 */
export class ProcessTransport implements Transport {
    private child: ChildProcessWithoutNullStreams | null = null;
    private readonly reader: LineReader = new LineReader();
    private readonly options: ProcessTransportOptions;
    private stderr: string = '';

    constructor(options: ProcessTransportOptions) {
        this.options = {
            ...options,
            timeout: options.timeout ?? 5,
            connectGrace: options.connectGrace ?? 250,
            command: options.command ?? (process.platform === 'win32' ? 'ncat' : 'nc'),
            args: options.args ?? ['{host}', '{port}'],
        };
    }

    public get isOpen(): boolean {
        return this.child !== null && this.child.exitCode === null && !this.reader.ended;
    }

    public open(): Promise<void> {
        return new Promise((resolve, reject) => {
            if (this.isOpen) return resolve();
            if (this.reader.ended) {
                return reject(new NutConnectError('Process transport cannot be reopened after close'));
            }

            const { host, port } = this.options;
            const command = this.options.command || 'nc';
            const args = (this.options.args || []).map(arg =>
                arg.replace('{host}', host).replace('{port}', String(port))
            );

            let child: ChildProcessWithoutNullStreams;
            try {
                child = spawn(command, args, { stdio: 'pipe', windowsHide: true });
            } catch (err) {
                const error = err instanceof Error ? err : new Error(String(err));
                return reject(new NutConnectError(`Cannot start ${command}: ${error.message}`, error));
            }
            this.child = child;

            // The helper counts as connected once it has produced output or has
            // stayed alive for `connectGrace` ms after starting
            let settled = false;
            let grace: NodeJS.Timeout | undefined;
            const settle = (error?: NutConnectError) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                clearTimeout(grace);
                if (error) reject(error);
                else resolve();
            };

            const timer = setTimeout(() => {
                settle(new NutConnectError(`${command} did not start within ${this.options.timeout} seconds`));
                this.close();
            }, (this.options.timeout || 5) * 1000);

            child.stdout.setEncoding('utf8');
            child.stderr.setEncoding('utf8');

            child.stdout.on('data', (chunk: string) => {
                this.reader.push(chunk);
                settle();
            });
            child.stderr.on('data', (chunk: string) => {
                this.stderr += chunk;
            });

            child.stdin.on('error', (err: Error) => {
                this.reader.end(new NutIOError(`${command} stdin: ${err.message}`, err));
            });

            child.once('error', (err: Error) => {
                this.reader.end(new NutIOError(`${command} failed: ${err.message}`, err));
                settle(new NutConnectError(`Cannot start ${command}: ${err.message}`, err));
            });

            child.once('spawn', () => {
                grace = setTimeout(() => settle(), this.options.connectGrace ?? 250);
            });

            // 'close' fires once stdio is drained, so stderr is complete here
            child.once('close', (code) => {
                const detail = this.stderr.trim();
                const message = `${command} exited with code ${code}${detail ? `: ${detail}` : ''}`;

                this.reader.end(new NutEOFError(message));
                settle(new NutConnectError(`Cannot connect to ${host}:${port}: ${message}`));
            });
        });
    }

    public writeLine(line: string): Promise<void> {
        return new Promise((resolve, reject) => {
            const child = this.child;
            if (!child || !this.isOpen) {
                return reject(new NutIOError('Helper process is not running. Call open() first.'));
            }

            child.stdin.write(`${line}\n`, 'utf8', (err) => {
                if (err) reject(new NutIOError(`Write failed: ${err.message}`, err));
                else resolve();
            });
        });
    }

    public readLine(timeoutMs: number): Promise<string> {
        return this.reader.next(timeoutMs);
    }

    /**
     * Terminates the helper. Safe to call any number of times.
     */
    public close(): void {
        this.reader.end(new NutEOFError('Transport closed'));

        const child = this.child;
        if (!child) return;
        this.child = null;

        child.stdin.end();
        if (child.exitCode === null && child.signalCode === null) {
            child.kill();
        }
    }
}
