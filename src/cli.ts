#!/usr/bin/env node
/**
 * coolled-sign command line tool.
 */

import { Command, Option } from 'commander';
import { CoolLedDevice } from './device';
import { discoverSigns } from './discovery';
import { formatPanel, DEFAULT_PANEL, type PanelDimensions } from './models/panel';
import { resolveHardwareProfile } from './models/hardware';
import { getCommandHex } from './protocol/commands';
import { decodeCapturedFrame, formatCapturedCommand } from './protocol/decoder';
import {
  LOG_LEVELS,
  addConnectionOptions,
  addContentOptions,
  buildCommands,
  configureLogging,
  deviceOptionsFrom,
  parseLogLevel,
  parsePanel,
  parseSeconds,
  type ConnectionOptions,
  type ContentOptions,
  type LogLevel,
} from './cli/options';

interface GlobalOptions {
  log: LogLevel;
}

interface HexOptions extends ContentOptions {
  panel: PanelDimensions;
  deviceName: string;
}

interface DecodeOptions {
  receive?: boolean;
  peer: string;
}

// Set once noble is loaded; its HCI socket keeps the process alive
let bluetoothLoaded = false;

async function loadTransport() {
  const { NobleTransport } = await import('./transport/noble-transport');
  bluetoothLoaded = true;
  return new NobleTransport();
}

function print(line: string): void {
  process.stdout.write(`${line}\n`);
}

const program = new Command();

program
  .name('coolled-sign')
  .description('Send text, images and animations to CoolLED Bluetooth LED signs')
  .version('0.1.0')
  .addOption(
    new Option('-l, --log <level>', `logging level (${LOG_LEVELS.join('/')})`).default('info').argParser(parseLogLevel)
  )
  .hook('preAction', (command) => {
    configureLogging(command.opts<GlobalOptions>().log);
  });

addConnectionOptions(addContentOptions(program.command('send')))
  .description('connect to a sign and send commands (raw, funky, content, then settings)')
  .action(async (options: ContentOptions & ConnectionOptions) => {
    const commands = buildCommands(options);
    if (commands.length === 0) {
      console.error('Nothing to send; pass --text, --image, --speed or another command option');
      process.exitCode = 2;
      return;
    }

    const device = new CoolLedDevice(await loadTransport(), deviceOptionsFrom(options));
    try {
      await device.connect();
      await device.sendCommands(commands);
      console.log('LED sign update completed successfully');
    } finally {
      await device.disconnect();
    }
  });

addContentOptions(program.command('hex'))
  .description('print the chunks that send would write, without a sign')
  .option('-p, --panel <WxH>', 'panel size', parsePanel, DEFAULT_PANEL)
  .option('-d, --device-name <name>', 'sign generation for the command bytes', 'CoolLEDX')
  .action(async (options: HexOptions) => {
    const hardware = resolveHardwareProfile(options.deviceName);
    console.debug(`Encoding for a ${formatPanel(options.panel)} ${hardware.generation}`);
    for (const command of buildCommands(options)) {
      process.stdout.write(await getCommandHex(command, options.panel, hardware));
    }
  });

program
  .command('decode')
  .description('decode captured frames given as hex')
  .argument('<hex...>', 'frames, one per argument')
  .option('--receive', 'frames were received from the sign')
  .option('--peer <label>', 'label of the other side', 'Sign')
  .action((frames: string[], options: DecodeOptions) => {
    for (const frame of frames) {
      const captured = decodeCapturedFrame(frame, options.receive ? 'receive' : 'send', options.peer);
      print(formatCapturedCommand(captured));
    }
  });

program
  .command('scan')
  .description('list nearby signs and their panel sizes')
  .option('--timeout <seconds>', 'scan duration', parseSeconds, 10)
  .action(async (options: { timeout: number }) => {
    const signs = await discoverSigns(await loadTransport(), Math.round(options.timeout * 1000));
    for (const sign of signs) {
      print(`${sign.name}\t${sign.address || sign.macAddress}\t${formatPanel(sign.panel)}\trssi ${sign.rssi ?? '?'}`);
    }
  });

program
  .parseAsync()
  .catch((error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  })
  .finally(() => {
    if (bluetoothLoaded) {
      process.exit();
    }
  });
