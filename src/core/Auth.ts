import type { NutCommand } from './NutProtocol';

/**
 * Username and password for upsd's USERNAME/PASSWORD handshake.
 */
export interface NutCredentials {
    username: string;
    password: string;
}

/**
 * Auth.ts
 * Keeps credentials out of logs.
 */
export class Auth {

    /**
     * Sanitizes sensitive strings for safe logging.
     * Use this when printing configuration objects to the console.
     * @example
     * Auth.mask('supersecret') // returns "s*********t"
     * Auth.mask('123') // returns "***"
     */
    public static mask(value: string | undefined): string {
        if (!value) return '<empty>';
        if (value.length < 4) return '***';

        const visibleStart = value.substring(0, 1);
        const visibleEnd = value.substring(value.length - 1);
        const maskLength = Math.min(value.length - 2, 8); // Cap mask length for readability

        return `${visibleStart}${'*'.repeat(maskLength)}${visibleEnd}`;
    }

    /**
     * True when a key name does not look like it holds a secret.
     */
    public static isSafeForLogging(key: string): boolean {
        const lowerKey = key.toLowerCase();
        return !lowerKey.includes('pass') &&
            !lowerKey.includes('secret') &&
            !lowerKey.includes('key') &&
            !lowerKey.includes('token');
    }

    /**
     * Printable form of a command, with the argument of PASSWORD masked.
     */
    public static describeCommand(command: NutCommand): string {
        const args = Auth.isSafeForLogging(command.verb)
            ? command.args
            : command.args.map(arg => Auth.mask(arg));

        return [command.verb, ...args].join(' ');
    }
}
