// ========================================
// Docker Command Gateway - SSH Channel (ssh2)
// ========================================

import fs from 'fs-extra';
import { Client } from 'ssh2';
import type { SshSettings } from '../config.js';
import { OutputCollector } from '../truncate.js';

export interface RemoteExecResult {
    exitCode: number | null;
    stdout: string;
    stderr: string;
}

export interface RemoteChannel {
    /** Output beyond maxOutputLength per stream is counted, not kept. */
    exec(command: string, maxOutputLength: number): Promise<RemoteExecResult>;
    close(): void;
}

/** Opens one authenticated channel; rejects when the connection cannot be established. */
export type ChannelOpener = (target: SshSettings) => Promise<RemoteChannel>;

class Ssh2Channel implements RemoteChannel {
    private readonly client: Client;
    private failPending: ((err: Error) => void) | null = null;
    private closed = false;

    constructor(client: Client) {
        this.client = client;
        // Errors after the handshake land on the in-flight exec, if any.
        this.client.on('error', (err: Error) => {
            console.error(`[SSH] Connection error:`, err.message);
            this.failPending?.(err);
        });
        // A dropped connection may close without ever raising 'error'.
        this.client.on('close', () => {
            this.failPending?.(new Error('SSH connection closed'));
        });
    }

    exec(command: string, maxOutputLength: number): Promise<RemoteExecResult> {
        return new Promise<RemoteExecResult>((resolve, reject) => {
            this.failPending = reject;
            this.client.exec(command, (err, stream) => {
                if (err) {
                    reject(err);
                    return;
                }

                const stdout = new OutputCollector(maxOutputLength);
                const stderr = new OutputCollector(maxOutputLength);
                let exitCode: number | null = null;

                // Decode across chunk boundaries so split multibyte characters survive.
                stream.setEncoding('utf8');
                stream.stderr.setEncoding('utf8');
                stream.on('data', (chunk: string) => stdout.append(chunk));
                stream.stderr.on('data', (chunk: string) => stderr.append(chunk));
                stream.on('exit', (code: number | null) => {
                    exitCode = code;
                });
                stream.on('error', (streamErr: Error) => reject(streamErr));
                stream.on('close', () => {
                    this.failPending = null;
                    resolve({ exitCode, stdout: stdout.text(), stderr: stderr.text() });
                });
            });
        });
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.failPending = null;
        this.client.end();
    }
}

export const openSshChannel: ChannelOpener = async (target) => {
    const privateKey = await fs.readFile(target.privateKeyPath);
    const client = new Client();

    await new Promise<void>((resolve, reject) => {
        const onError = (err: Error) => {
            client.removeListener('ready', onReady);
            client.end();
            reject(err);
        };
        const onReady = () => {
            client.removeListener('error', onError);
            resolve();
        };
        client.once('ready', onReady);
        client.once('error', onError);
        client.connect({
            host: target.host,
            port: target.port,
            username: target.user,
            privateKey,
            readyTimeout: target.connectTimeoutMs,
        });
    });

    console.log(`[SSH] Connected to ${target.user}@${target.host}:${target.port}`);
    return new Ssh2Channel(client);
};
