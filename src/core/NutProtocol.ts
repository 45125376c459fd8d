/**
 * NutProtocol.ts
 * Stateless translation between commands and upsd wire lines.
 *
 * Wire rules:
 * - One command per line, tokens separated by single spaces.
 * - A token holding whitespace, `"` or `\` travels in double quotes, with `"` and `\`
 *   escaped by a backslash. The empty string travels as `""`.
 */

/**
 * A request: `verb` is sent bare, `args` are quoted as needed.
 */
export interface NutCommand {
    verb: string;
    args: string[];
}

export interface OkLine {
    kind: 'ok';
    /** Trailing text, e.g. `Goodbye`, `MASTER-GRANTED`, `TRACKING <id>` */
    detail?: string;
}

export interface ErrorLine {
    kind: 'error';
    code: string;
    detail?: string;
}

export interface DataLine {
    kind: 'data';
    fields: string[];
}

export interface ListBeginLine {
    kind: 'listBegin';
    subject: string;
}

export interface ListEndLine {
    kind: 'listEnd';
    subject: string;
}

export type ResponseLine = OkLine | ErrorLine | DataLine | ListBeginLine | ListEndLine;

const NEEDS_QUOTING = /[\s"\\]/;
const LINE_BREAK = /[\r\n]/;

export class NutProtocol {

    /**
     * Builds a command value. `NutProtocol.command('GET', 'VAR', ups, name)`
     */
    public static command(verb: string, ...args: string[]): NutCommand {
        return { verb, args };
    }

    /**
     * Quotes a single argument when the wire rules require it.
     */
    public static quote(arg: string): string {
        if (arg.length === 0) return '""';
        if (!NEEDS_QUOTING.test(arg)) return arg;

        return `"${arg.replace(/[\\"]/g, (ch) => `\\${ch}`)}"`;
    }

    /**
     * Converts a command into a wire line (without the trailing newline).
     */
    public static encode(command: NutCommand): string {
        return [command.verb, ...command.args.map(arg => NutProtocol.quote(arg))].join(' ');
    }

    /**
     * CR and LF cannot be escaped inside a line, so arguments holding them are refused
     * before anything is written.
     */
    public static isSafeArgument(arg: string): boolean {
        return !LINE_BREAK.test(arg);
    }

    /**
     * Splits a wire line into tokens, honouring quotes and backslash escapes.
     * An unterminated quote simply runs to the end of the line.
     */
    public static tokenize(line: string): string[] {
        const tokens: string[] = [];
        let current = '';
        let inToken = false;
        let inQuotes = false;

        for (let i = 0; i < line.length; i++) {
            const ch = line[i];

            if (ch === '\\' && i + 1 < line.length) {
                current += line[++i];
                inToken = true;
                continue;
            }

            if (ch === '"') {
                inQuotes = !inQuotes;
                inToken = true;
                continue;
            }

            if (!inQuotes && /\s/.test(ch)) {
                if (inToken) {
                    tokens.push(current);
                    current = '';
                    inToken = false;
                }
                continue;
            }

            current += ch;
            inToken = true;
        }

        if (inToken) tokens.push(current);
        return tokens;
    }

    /**
     * Classifies a wire line. Never throws: anything unrecognised comes back as `data`
     * and the session decides whether it is acceptable in context.
     */
    public static decode(line: string): ResponseLine {
        const tokens = NutProtocol.tokenize(line);
        const [first, second] = tokens;

        if (first === 'OK') {
            return tokens.length > 1
                ? { kind: 'ok', detail: tokens.slice(1).join(' ') }
                : { kind: 'ok' };
        }

        if (first === 'ERR' && tokens.length > 1) {
            return tokens.length > 2
                ? { kind: 'error', code: second, detail: tokens.slice(2).join(' ') }
                : { kind: 'error', code: second };
        }

        if ((first === 'BEGIN' || first === 'END') && second === 'LIST' && tokens.length > 2) {
            const subject = tokens.slice(2).join(' ');
            return first === 'BEGIN'
                ? { kind: 'listBegin', subject }
                : { kind: 'listEnd', subject };
        }

        return { kind: 'data', fields: tokens };
    }

    /**
     * Reverses `encode`: the first token is the verb, the rest are arguments.
     */
    public static parseCommand(line: string): NutCommand {
        const [verb = '', ...args] = NutProtocol.tokenize(line);
        return { verb, args };
    }

    /**
     * The subject a `LIST` command announces in its BEGIN/END markers.
     * `LIST VAR myups` → `VAR myups`
     */
    public static listSubject(command: NutCommand): string {
        return command.args.join(' ');
    }
}
