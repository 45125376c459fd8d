import { vi } from 'vitest';
import { NutLogger } from '../../src/core/Logger';
import { NutEOFError, NutIOError, NutTimeoutError } from '../../src/core/NutError';
import { Transport } from '../../src/core/Transport';

/**
 * Maps a written line to the raw text upsd would answer (one or more lines).
 * `undefined` means silence: the next read times out.
 */
export type Responder = (line: string) => string | undefined;

/**
 * In-memory stand-in for a upsd connection. Records every written line and queues
 * the scripted answer for reading.
 */
export class ScriptedTransport implements Transport {
    public readonly written: string[] = [];
    /** Writes (`> line`) and reads (`< line`) in the order they happened */
    public readonly events: string[] = [];
    public closeCalls = 0;
    /** When set, running out of scripted lines reads as the server hanging up */
    public hangUpWhenDrained = false;
    public upgradedWith: unknown = null;
    private pending: string[] = [];
    private opened = false;
    private closed = false;

    constructor(
        private readonly respond: Responder,
        private readonly openError: Error | null = null
    ) {}

    public get isOpen(): boolean {
        return this.opened && !this.closed;
    }

    public async open(): Promise<void> {
        if (this.openError) throw this.openError;
        this.opened = true;
    }

    public async writeLine(line: string): Promise<void> {
        if (this.closed) throw new NutIOError('closed');
        this.written.push(line);
        this.events.push(`> ${line}`);

        const answer = this.respond(line);
        if (answer === undefined) return;
        this.pending.push(...answer.replace(/\n$/, '').split('\n'));
    }

    public async readLine(timeoutMs: number): Promise<string> {
        if (this.closed) throw new NutEOFError('Transport closed');
        const line = this.pending.shift();
        if (line === undefined) {
            throw this.hangUpWhenDrained ? new NutEOFError() : new NutTimeoutError(timeoutMs);
        }
        this.events.push(`< ${line}`);
        return line;
    }

    public close(): void {
        this.closeCalls++;
        this.closed = true;
    }
}

/**
 * Transport with STARTTLS support, recording the upgrade options.
 */
export class UpgradableScriptedTransport extends ScriptedTransport {
    public async upgradeToTls(options: unknown): Promise<void> {
        this.upgradedWith = options;
    }
}

/**
 * Responder backed by a fixed table of wire line → answer.
 * Unknown lines get `ERR UNKNOWN-COMMAND`.
 */
export function upsdScript(table: Record<string, string | undefined>): Responder {
    return (line) => (Object.prototype.hasOwnProperty.call(table, line) ? table[line] : 'ERR UNKNOWN-COMMAND\n');
}

/**
 * A small upsd with one UPS named `myups`, user `admin` / `test-secret`.
 */
export const MOCK_UPSD: Record<string, string | undefined> = {
    'HELP': 'Commands: HELP VER GET LIST SET INSTCMD LOGIN LOGOUT USERNAME PASSWORD STARTTLS\n',
    'VER': 'Network UPS Tools upsd 2.8.1 - https://www.networkupstools.org/\n',
    'USERNAME admin': 'OK\n',
    'PASSWORD test-secret': 'OK\n',
    'PASSWORD wrong': 'ERR ACCESS-DENIED\n',
    'LIST UPS': 'BEGIN LIST UPS\nUPS myups "Test UPS"\nUPS backup "Backup UPS"\nEND LIST UPS\n',
    'LIST VAR myups':
        'BEGIN LIST VAR myups\n' +
        'VAR myups battery.charge "100"\n' +
        'VAR myups battery.runtime "1800"\n' +
        'VAR myups ups.status "OL CHRG"\n' +
        'VAR myups ups.load "23"\n' +
        'VAR myups input.voltage "230.4"\n' +
        'VAR myups device.mfr "Acme Power"\n' +
        'END LIST VAR myups\n',
    'LIST VAR bogus': 'ERR UNKNOWN-UPS\n',
    'LIST RW myups': 'BEGIN LIST RW myups\nRW myups ups.id "rack-1"\nEND LIST RW myups\n',
    'LIST CMD myups': 'BEGIN LIST CMD myups\nCMD myups test.battery.start\nCMD myups beeper.disable\nEND LIST CMD myups\n',
    'GET CMDDESC myups test.battery.start': 'CMDDESC myups test.battery.start "Start a battery test"\n',
    'GET CMDDESC myups beeper.disable': 'CMDDESC myups beeper.disable "Disable the UPS beeper"\n',
    'LIST CLIENT myups': 'BEGIN LIST CLIENT myups\nCLIENT myups 10.0.0.5\nCLIENT myups ::1\nEND LIST CLIENT myups\n',
    'LIST ENUM myups input.transfer.low': 'BEGIN LIST ENUM myups input.transfer.low\nENUM myups input.transfer.low "180"\nENUM myups input.transfer.low "190"\nEND LIST ENUM myups input.transfer.low\n',
    'LIST RANGE myups input.transfer.high': 'BEGIN LIST RANGE myups input.transfer.high\nRANGE myups input.transfer.high "250" "260"\nEND LIST RANGE myups input.transfer.high\n',
    'GET VAR myups battery.charge': 'VAR myups battery.charge "100"\n',
    'GET VAR myups ups.mystery': 'ERR VAR-NOT-SUPPORTED\n',
    'GET TYPE myups ups.id': 'TYPE myups ups.id RW STRING:32\n',
    'GET DESC myups battery.charge': 'DESC myups battery.charge "Battery charge (percent)"\n',
    'GET UPSDESC myups': 'UPSDESC myups "Test UPS"\n',
    'GET NUMLOGINS myups': 'NUMLOGINS myups 2\n',
    'SET VAR myups ups.id "rack 2"': 'OK\n',
    'INSTCMD myups test.battery.start': 'OK\n',
    'LOGIN myups': 'OK\n',
    'MASTER myups': 'OK MASTER-GRANTED\n',
    'FSD myups': 'OK FSD-SET\n',
    'LOGOUT': 'OK Goodbye\n',
    'STARTTLS': 'OK STARTTLS\n',
};

export function silentLogger(): NutLogger {
    return {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    };
}
