import { describe, it, expect, vi, afterEach } from 'vitest';
import { LineReader } from '../src/core/LineReader';
import { NutEOFError, NutTimeoutError } from '../src/core/NutError';

describe('LineReader', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('should split chunks on newlines and drop carriage returns', async () => {
        const reader = new LineReader();
        reader.push('OK\r\nVAR myups ');
        reader.push('battery.charge "100"\n');

        await expect(reader.next(100)).resolves.toBe('OK');
        await expect(reader.next(100)).resolves.toBe('VAR myups battery.charge "100"');
    });

    it('should hand a line to a reader that is already waiting', async () => {
        const reader = new LineReader();
        const pending = reader.next(1000);
        reader.push('END LIST UPS\n');

        await expect(pending).resolves.toBe('END LIST UPS');
    });

    it('should reject with a timeout when no line arrives', async () => {
        vi.useFakeTimers();
        const reader = new LineReader();
        const pending = reader.next(250);
        const assertion = expect(pending).rejects.toBeInstanceOf(NutTimeoutError);

        vi.advanceTimersByTime(250);
        await assertion;
    });

    it('should serve buffered lines before reporting the end of the stream', async () => {
        const reader = new LineReader();
        reader.push('OK Goodbye\n');
        reader.end();

        await expect(reader.next(100)).resolves.toBe('OK Goodbye');
        await expect(reader.next(100)).rejects.toBeInstanceOf(NutEOFError);
    });

    it('should fail pending reads when the stream ends', async () => {
        const reader = new LineReader();
        const pending = reader.next(1000);
        reader.end(new NutEOFError('gone'));

        await expect(pending).rejects.toThrow('gone');
        expect(reader.ended).toBe(true);
    });

    it('should keep a partial line until its newline arrives', async () => {
        vi.useFakeTimers();
        const reader = new LineReader();
        reader.push('BEGIN LIST');

        const pending = reader.next(100);
        const assertion = expect(pending).rejects.toBeInstanceOf(NutTimeoutError);
        vi.advanceTimersByTime(100);
        await assertion;

        reader.push(' UPS\n');
        await expect(reader.next(100)).resolves.toBe('BEGIN LIST UPS');
    });
});
