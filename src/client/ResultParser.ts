import { NutProtocolError } from '../core/NutError';
import { DataLine } from '../core/NutProtocol';
import { isUpsStatusFlag, UpsStatus, VarRange } from '../types';
import { hasPrefix, parseNumeric } from '../utils/Helpers';

/**
 * ResultParser.ts
 * Reshapes the data lines of a response into the values the client returns.
 *
 * Every row is `<KIND> <prefix...> <payload...>`, e.g. `VAR myups battery.charge 100`
 * (kind `VAR`, prefix `[myups]`, payload `[battery.charge, 100]`). A row with another
 * kind, another prefix, or the wrong payload width is a protocol error.
 */
export class ResultParser {

    /**
     * Rows of `<KIND> <prefix...> <key> <value>` → `key => value`.
     * Keys keep server order, integer-like names and `__proto__` included.
     */
    public static toMapping(rows: DataLine[], kind: string, prefix: string[] = []): Map<string, string> {
        const mapping = new Map<string, string>();

        for (const row of rows) {
            const [key, value] = ResultParser.payload(row, kind, prefix, 2);
            mapping.set(key, value);
        }

        return mapping;
    }

    /**
     * Rows of `<KIND> <prefix...> <item>` → `[item, ...]`.
     */
    public static toList(rows: DataLine[], kind: string, prefix: string[] = []): string[] {
        return rows.map(row => ResultParser.payload(row, kind, prefix, 1)[0]);
    }

    /**
     * Rows of `RANGE <prefix...> <min> <max>`.
     */
    public static toRanges(rows: DataLine[], prefix: string[]): VarRange[] {
        return rows.map(row => {
            const [min, max] = ResultParser.payload(row, 'RANGE', prefix, 2);
            return { min, max };
        });
    }

    /**
     * The single payload token of a one-line reply, e.g. the value of `GET VAR`.
     */
    public static toValue(rows: DataLine[], kind: string, prefix: string[]): string {
        return ResultParser.payload(ResultParser.single(rows, kind), kind, prefix, 1)[0];
    }

    /**
     * Every payload token of a one-line reply, joined by a space.
     * `TYPE myups ups.id RW STRING:32` → `RW STRING:32`
     */
    public static toText(rows: DataLine[], kind: string, prefix: string[]): string {
        return ResultParser.payload(ResultParser.single(rows, kind), kind, prefix).join(' ');
    }

    /**
     * Free-form reply such as HELP or VER, tokens joined by a space.
     */
    public static toPlainText(rows: DataLine[]): string {
        return rows.map(row => row.fields.join(' ')).join('\n');
    }

    /**
     * Typed snapshot built from a `LIST VAR` mapping.
     */
    public static toStatus(upsName: string, variables: Map<string, string>): UpsStatus {
        const status = variables.get('ups.status');
        const flags = status ? status.split(/\s+/).filter(flag => flag.length > 0) : [];

        return {
            upsName,
            status,
            flags,
            knownFlags: flags.filter(isUpsStatusFlag),
            onLine: flags.includes('OL'),
            onBattery: flags.includes('OB'),
            lowBattery: flags.includes('LB'),
            charge: parseNumeric(variables.get('battery.charge')),
            runtimeSeconds: parseNumeric(variables.get('battery.runtime')),
            load: parseNumeric(variables.get('ups.load')),
            inputVoltage: parseNumeric(variables.get('input.voltage')),
            outputVoltage: parseNumeric(variables.get('output.voltage')),
            batteryVoltage: parseNumeric(variables.get('battery.voltage')),
            manufacturer: variables.get('device.mfr') ?? variables.get('ups.mfr'),
            model: variables.get('device.model') ?? variables.get('ups.model'),
            variables,
        };
    }

    private static single(rows: DataLine[], kind: string): DataLine {
        if (rows.length !== 1) {
            throw new NutProtocolError(`Expected one ${kind} line, got ${rows.length}`);
        }
        return rows[0];
    }

    private static payload(row: DataLine, kind: string, prefix: string[], width?: number): string[] {
        const [head, ...rest] = row.fields;
        const payload = rest.slice(prefix.length);

        const fits = head === kind
            && hasPrefix(rest, prefix)
            && (width === undefined ? payload.length > 0 : payload.length === width);

        if (!fits) {
            throw new NutProtocolError(`Unexpected ${kind} row "${row.fields.join(' ')}"`);
        }
        return payload;
    }
}
