import { NutEOFError, NutTimeoutError } from './NutError';

interface PendingRead {
    resolve: (line: string) => void;
    reject: (error: Error) => void;
    timer: NodeJS.Timeout;
}

/**
 * LineReader
 * Framing for newline-terminated protocols.
 * Buffers stream chunks, splits them on `\n` (dropping a trailing `\r`) and hands
 * complete lines to readers in arrival order.
 */
export class LineReader {
    private buffer: string = '';
    private lines: string[] = [];
    private waiting: PendingRead[] = [];
    private endError: Error | null = null;

    /**
     * Appends a chunk of decoded text from the stream.
     */
    public push(chunk: string): void {
        this.buffer += chunk;

        let index: number;
        while ((index = this.buffer.indexOf('\n')) >= 0) {
            let line = this.buffer.slice(0, index);
            this.buffer = this.buffer.slice(index + 1);

            if (line.endsWith('\r')) line = line.slice(0, -1);
            this.deliver(line);
        }
    }

    /**
     * Marks the stream as finished. Pending and future reads fail with `error`
     * once the already-buffered lines are consumed.
     */
    public end(error: Error = new NutEOFError()): void {
        if (this.endError) return;
        this.endError = error;

        for (const pending of this.waiting.splice(0)) {
            clearTimeout(pending.timer);
            pending.reject(error);
        }
    }

    public get ended(): boolean {
        return this.endError !== null;
    }

    /**
     * Resolves with the next complete line, or rejects with `NutTimeoutError`
     * after `timeoutMs`.
     */
    public next(timeoutMs: number): Promise<string> {
        const line = this.lines.shift();
        if (line !== undefined) return Promise.resolve(line);
        if (this.endError) return Promise.reject(this.endError);

        return new Promise<string>((resolve, reject) => {
            const pending: PendingRead = {
                resolve,
                reject,
                timer: setTimeout(() => {
                    this.waiting = this.waiting.filter(p => p !== pending);
                    reject(new NutTimeoutError(timeoutMs));
                }, timeoutMs),
            };
            this.waiting.push(pending);
        });
    }

    private deliver(line: string): void {
        const pending = this.waiting.shift();
        if (pending) {
            clearTimeout(pending.timer);
            pending.resolve(line);
        } else {
            this.lines.push(line);
        }
    }
}
