import { describe, it, expect, afterEach } from 'vitest';
import * as net from 'net';
import { NutConnectError, NutEOFError, NutIOError } from '../src/core/NutError';
import { ProcessTransport } from '../src/core/ProcessTransport';
import { SocketTransport } from '../src/core/SocketTransport';
import { createTransport } from '../src/core/Transport';
import { NutSession } from '../src/client/NutSession';

/**
 * In-process upsd stand-in on an ephemeral port. Answers VER in two chunks (with a
 * CRLF terminator) and hangs up on LOGOUT.
 */
function startServer(): Promise<{ server: net.Server; port: number }> {
    return new Promise((resolve, reject) => {
        const server = net.createServer(socket => {
            socket.setEncoding('utf8');
            let buffer = '';

            socket.on('data', (chunk: string) => {
                buffer += chunk;
                let index: number;
                while ((index = buffer.indexOf('\n')) >= 0) {
                    const line = buffer.slice(0, index);
                    buffer = buffer.slice(index + 1);

                    if (line === 'VER') {
                        socket.write('Network UPS Tools ');
                        setTimeout(() => socket.write('upsd 2.8.1\r\n'), 10);
                    } else if (line === 'LOGOUT') {
                        socket.end('OK Goodbye\n');
                    } else {
                        socket.write('ERR UNKNOWN-COMMAND\n');
                    }
                }
            });
        });

        server.once('error', reject);
        server.listen(0, '127.0.0.1', () => {
            const address = server.address();
            if (address === null || typeof address === 'string') {
                reject(new Error('Server has no TCP address'));
                return;
            }
            resolve({ server, port: address.port });
        });
    });
}

function stopServer(server: net.Server): Promise<void> {
    return new Promise(resolve => server.close(() => resolve()));
}

describe('SocketTransport', () => {
    let server: net.Server | null = null;
    let transport: SocketTransport | null = null;

    afterEach(async () => {
        transport?.close();
        transport = null;
        if (server) await stopServer(server);
        server = null;
    });

    it('should exchange lines reassembled from several chunks', async () => {
        const started = await startServer();
        server = started.server;
        transport = new SocketTransport({ host: '127.0.0.1', port: started.port, timeout: 2 });

        await transport.open();
        expect(transport.isOpen).toBe(true);

        await transport.writeLine('VER');
        await expect(transport.readLine(2000)).resolves.toBe('Network UPS Tools upsd 2.8.1');

        await transport.writeLine('HELP');
        await expect(transport.readLine(2000)).resolves.toBe('ERR UNKNOWN-COMMAND');
    });

    it('should deliver the last line and then EOF when the server hangs up', async () => {
        const started = await startServer();
        server = started.server;
        transport = new SocketTransport({ host: '127.0.0.1', port: started.port, timeout: 2 });
        await transport.open();

        await transport.writeLine('LOGOUT');

        await expect(transport.readLine(2000)).resolves.toBe('OK Goodbye');
        await expect(transport.readLine(2000)).rejects.toBeInstanceOf(NutEOFError);
    });

    it('should fail reads and writes after close', async () => {
        const started = await startServer();
        server = started.server;
        transport = new SocketTransport({ host: '127.0.0.1', port: started.port, timeout: 2 });
        await transport.open();

        transport.close();
        transport.close();

        expect(transport.isOpen).toBe(false);
        await expect(transport.readLine(100)).rejects.toBeInstanceOf(NutEOFError);
        await expect(transport.writeLine('VER')).rejects.toBeInstanceOf(NutIOError);
    });

    it('should report a refused connection as NutConnectError', async () => {
        const started = await startServer();
        await stopServer(started.server);

        transport = new SocketTransport({ host: '127.0.0.1', port: started.port, timeout: 2 });

        await expect(transport.open()).rejects.toBeInstanceOf(NutConnectError);
        expect(transport.isOpen).toBe(false);
    });
});

describe('ProcessTransport', () => {
    let transport: ProcessTransport | null = null;

    afterEach(() => {
        transport?.close();
        transport = null;
    });

    it('should carry lines over the helper stdin and stdout', async () => {
        transport = new ProcessTransport({
            host: '127.0.0.1',
            port: 3493,
            command: process.execPath,
            args: ['-e', 'process.stdin.pipe(process.stdout)'],
        });

        await transport.open();
        expect(transport.isOpen).toBe(true);

        await transport.writeLine('VER');
        await expect(transport.readLine(5000)).resolves.toBe('VER');
    });

    it('should substitute host and port into the helper arguments', async () => {
        transport = new ProcessTransport({
            host: 'ups.local',
            port: 3494,
            command: process.execPath,
            args: ['-e', 'console.log(process.argv.slice(1).join(" "))', '{host}', '{port}'],
        });

        await transport.open();

        await expect(transport.readLine(5000)).resolves.toBe('ups.local 3494');
    });

    it('should fail to open when the helper exits before connecting', async () => {
        transport = new ProcessTransport({
            host: '127.0.0.1',
            port: 3493,
            command: process.execPath,
            args: ['-e', 'process.stderr.write("connection refused"); process.exit(3)'],
            connectGrace: 4000,
        });

        const error = await transport.open().catch(e => e);

        expect(error).toBeInstanceOf(NutConnectError);
        expect(error.message).toMatch(/^Cannot connect to 127\.0\.0\.1:3493: .* exited with code 3: connection refused$/);
        expect(transport.isOpen).toBe(false);
    });

    it('should deliver buffered output and then EOF when the helper exits after connecting', async () => {
        transport = new ProcessTransport({
            host: '127.0.0.1',
            port: 3493,
            command: process.execPath,
            args: ['-e', 'console.log("OK Goodbye"); process.exit(0)'],
            connectGrace: 4000,
        });

        await transport.open();

        await expect(transport.readLine(5000)).resolves.toBe('OK Goodbye');
        const error = await transport.readLine(5000).catch(e => e);
        expect(error).toBeInstanceOf(NutEOFError);
        expect(error.message).toMatch(/exited with code 0$/);
    });

    it('should report a missing helper as NutConnectError', async () => {
        transport = new ProcessTransport({
            host: '127.0.0.1',
            port: 3493,
            command: 'nut-helper-that-does-not-exist',
        });

        await expect(transport.open()).rejects.toBeInstanceOf(NutConnectError);
    });

    it('should stop the helper on close and refuse to reopen', async () => {
        transport = new ProcessTransport({
            host: '127.0.0.1',
            port: 3493,
            command: process.execPath,
            args: ['-e', 'process.stdin.pipe(process.stdout)'],
        });
        await transport.open();

        transport.close();

        expect(transport.isOpen).toBe(false);
        await expect(transport.readLine(100)).rejects.toBeInstanceOf(NutEOFError);
        await expect(transport.writeLine('VER')).rejects.toBeInstanceOf(NutIOError);
        await expect(transport.open()).rejects.toThrow('Process transport cannot be reopened after close');
    });
});

describe('createTransport', () => {
    const endpoint = { host: '127.0.0.1', port: 3493, timeout: 5 };

    it('should build a socket transport by default', () => {
        expect(createTransport(endpoint)).toBeInstanceOf(SocketTransport);
    });

    it('should build a process transport on request', () => {
        expect(createTransport(endpoint, { transport: 'process' })).toBeInstanceOf(ProcessTransport);
    });
});

describe('NutSession over the process transport', () => {
    it('should fail to connect when the helper cannot reach upsd', async () => {
        const endpoint = { host: '127.0.0.1', port: 3493, timeout: 5 };

        const error = await NutSession.connect(endpoint, {
            transport: 'process',
            processCommand: process.execPath,
            processArgs: ['-e', 'process.stderr.write("connection refused"); process.exit(1)'],
            processConnectGrace: 4000,
        }).catch(e => e);

        expect(error).toBeInstanceOf(NutConnectError);
        expect(error.message).toMatch(/exited with code 1: connection refused$/);
    });
});
