// src/cli/index.ts
import { Command, InvalidArgumentError } from 'commander';
import cliProgress from 'cli-progress';
import type { ChannelBlock, IPacketInfo, IProgressBar } from '../@types/index.ts';
import { config } from '../config/index.ts';
import { StreamReceiver } from '../core/receiver/index.ts';
import { getLogger, NoopLogFacility } from '../utils/logging/logUtils.ts';

interface IReadCommandOptions {
    address: string;
    port: number;
    packets?: number;
    timeout: number;
    log?: boolean;
    verbose?: boolean;
}

function parseInteger(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (Number.isNaN(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Not a non-negative integer.');
    }
    return parsed;
}

/**
 * Renders one decoded packet as a header line plus one line per channel.
 */
export function formatPacket(
    index: number,
    blocks: ChannelBlock[],
    packetInfo: IPacketInfo | null,
    previewRows: number = config.previewRows,
): string[] {
    const sequence = packetInfo ? ` (seq ${packetInfo.sequenceNumber}, status 0x${packetInfo.streamStatus.toString(16)})` : '';
    const lines = [`Packet ${index}${sequence}: ${blocks.length} channels`];
    blocks.forEach((rows, channel) => {
        const preview = rows.slice(0, previewRows).map((row) => `[${row.join(', ')}]`).join(' ');
        lines.push(`  #${channel}: ${rows.length} rows${preview ? ` ${preview}` : ''}`);
    });
    return lines;
}

export function createProgram(): Command {
    const program = new Command();
    program
        .name('dst-stream')
        .description('Receive and decode a measurement data stream over TCP')
        .version('1.0.0');

    program
        .command('read')
        .description('Connect to a data stream port and print decoded packets')
        .option('-a, --address <host>', 'Stream host', config.connection.host)
        .option('-p, --port <number>', 'Stream TCP port', parseInteger, config.connection.port)
        .option('-n, --packets <number>', 'Number of packets to read before disconnecting', parseInteger)
        .option('-t, --timeout <ms>', 'Read timeout in milliseconds', parseInteger, config.connection.timeoutMs)
        .option('-l, --log', 'Enable logging')
        .option('-v, --verbose', 'Enable verbose logging')
        .showHelpAfterError()
        .action(async (options: IReadCommandOptions) => {
            const verbose = options.verbose || false;
            const isLogging = options.log || verbose;
            const logger = getLogger('receiver', isLogging ? console : NoopLogFacility, verbose);
            const receiver = new StreamReceiver({ logger, verbose, timeoutMs: options.timeout });

            if (!(await receiver.connect(options.address, options.port))) {
                console.error(`Could not connect to ${options.address}:${options.port}`);
                process.exitCode = 1;
                return;
            }

            let progressBar: IProgressBar | undefined;
            if (!isLogging && options.packets !== undefined) {
                progressBar = new cliProgress.SingleBar({
                    format: 'Receiving |{bar}| {percentage}% || {value}/{total} packets',
                    barCompleteChar: '█',
                    barIncompleteChar: '░',
                    hideCursor: true,
                }, cliProgress.Presets.shades_grey);
                progressBar.start(options.packets, 0);
            }

            let received = 0;
            const stop = () => receiver.disconnect();
            process.once('SIGINT', stop);
            try {
                while (options.packets === undefined || received < options.packets) {
                    const blocks = await receiver.readPacket();
                    if (blocks === null) continue;
                    received++;
                    if (progressBar) {
                        progressBar.increment();
                    } else {
                        console.log(formatPacket(received, blocks, receiver.packetInfo).join('\n'));
                    }
                }
                progressBar?.stop();
            } catch (error) {
                progressBar?.stop();
                if (receiver.isConnected) {
                    logger.error(`Reading failed: ${error}`);
                    console.error(`Reading failed after ${received} packets: ${error}`);
                    process.exitCode = 1;
                } else {
                    logger.info(`Stopped after ${received} packets`);
                }
            } finally {
                process.off('SIGINT', stop);
                receiver.disconnect();
            }
        });

    return program;
}
