// src/core/transport/streamReader.ts

import type { IByteReader } from '../../@types/index.ts';
import type { Readable } from 'node:stream';
import { Buffer } from 'node:buffer';
import { ConnectionClosedError, ReadTimeoutError } from '../../utils/errors.ts';

/**
 * Exact-size reads on top of a readable byte stream (usually a `net.Socket`).
 * Bytes stay in the stream's own buffer until a read for their full count can be satisfied,
 * so a read never takes more than it asked for.
 */
export class StreamReader implements IByteReader {
    private ended = false;
    private failure: Error | null = null;
    private waiter: (() => void) | null = null;

    constructor(
        private readonly stream: Readable,
        public timeoutMs: number,
    ) {
        stream.on('readable', this.wake);
        stream.on('end', () => {
            this.ended = true;
            this.wake();
        });
        stream.on('close', () => {
            this.ended = true;
            this.wake();
        });
        stream.on('error', (error: Error) => {
            this.failure = error;
            this.wake();
        });
    }

    /**
     * Resolves with exactly `size` bytes.
     *
     * @param size - Number of bytes to read.
     * @throws ReadTimeoutError when the bytes do not arrive within `timeoutMs`.
     * @throws ConnectionClosedError when the stream ends or fails first.
     */
    readExact(size: number): Promise<Buffer> {
        if (size === 0) {
            return Promise.resolve(Buffer.alloc(0));
        }
        if (this.waiter) {
            return Promise.reject(new Error('A read is already pending on this stream'));
        }
        return new Promise<Buffer>((resolve, reject) => {
            const finish = (): void => {
                clearTimeout(timer);
                this.waiter = null;
            };
            const timer = setTimeout(() => {
                finish();
                reject(new ReadTimeoutError(size, this.timeoutMs));
            }, this.timeoutMs);

            const attempt = (): void => {
                const chunk: unknown = this.stream.read(size);
                if (Buffer.isBuffer(chunk)) {
                    finish();
                    if (chunk.length === size) {
                        resolve(chunk);
                    } else {
                        reject(new ConnectionClosedError(`Connection closed after ${chunk.length} of ${size} bytes`));
                    }
                    return;
                }
                if (this.failure) {
                    finish();
                    reject(new ConnectionClosedError(`Connection failed: ${this.failure.message}`, { cause: this.failure }));
                } else if (this.ended || this.stream.destroyed) {
                    finish();
                    reject(new ConnectionClosedError());
                }
            };

            this.waiter = attempt;
            attempt();
        });
    }

    private readonly wake = (): void => {
        if (this.waiter) {
            this.waiter();
        }
    };
}
