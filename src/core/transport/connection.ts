// src/core/transport/connection.ts

import { createConnection, type Socket } from 'node:net';

/**
 * Opens a TCP connection.
 *
 * @return The connected socket; rejects on resolution failure, refusal or when `timeoutMs` passes first.
 */
export function openConnection(host: string, port: number, timeoutMs: number): Promise<Socket> {
    return new Promise<Socket>((resolve, reject) => {
        const socket = createConnection({ host, port });
        const timer = setTimeout(() => {
            socket.destroy();
            reject(new Error(`Connection to ${host}:${port} timed out after ${timeoutMs} ms`));
        }, timeoutMs);

        socket.once('connect', () => {
            clearTimeout(timer);
            socket.removeAllListeners('error');
            resolve(socket);
        });
        socket.once('error', (error: Error) => {
            clearTimeout(timer);
            socket.destroy();
            reject(error);
        });
    });
}
