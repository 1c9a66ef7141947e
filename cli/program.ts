/**
 * Command definitions, kept apart from index.ts so tests can build the program
 */

import { Command, Option } from 'commander';
import { BUILD_VERSION } from '../src/utils/version.js';
import { CONTAINER, SCRAMBLE, SIGNAL } from '../src/utils/constants.js';
import { encodeCommand } from './encode.js';
import { descrambleCommand, scrambleCommand } from './scramble.js';
import { decodeCommand } from './decode.js';
import { infoCommand } from './info.js';
import { wavCommand } from './wav.js';
import { parseBackend, parseInteger, parsePositiveNumber, parseStandard } from './options.js';

function addKeyedOptions(command: Command): Command {
  return command
    .option('-k, --key <hex>', 'Secret key as hex (32 bytes selects the ChaCha20 keystream)')
    .option('-p, --password <password>', 'Derive the key from a password (SHA-256)')
    .option('--segments <n>', `Segments per line (default: ${SCRAMBLE.SEGMENTS_PER_LINE})`, parseInteger)
    .option('--sync-end <n>', `First scrambled sample of a line (default: ${SCRAMBLE.SYNC_END})`, parseInteger)
    .option('--front-porch-reserve <n>', `Samples left untouched at the end of a line (default: ${SCRAMBLE.FRONT_PORCH_RESERVE})`, parseInteger)
    .option('--permutation', 'Enable segment permutation')
    .option('--no-permutation', 'Disable segment permutation')
    .option('--inversion', 'Enable segment inversion')
    .option('--no-inversion', 'Disable segment inversion')
    .option('--shift', 'Enable segment shift')
    .option('--no-shift', 'Disable segment shift')
    .addOption(new Option('--backend <backend>', 'Keystream backend: auto, cipher or fallback').argParser(parseBackend))
    .option('-q, --quiet', 'Suppress progress output')
    .option('-v, --verbose', 'Show debug output');
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('analog-scrambler')
    .description('Encode video as an analog composite signal and scramble it with a shared key.')
    .version(BUILD_VERSION)
    .addHelpText('after', `
Examples:
  $ analog-scrambler encode --pattern --frames 30 -o test.analog
  $ analog-scrambler scramble test.analog secret.analog -p "my password"
  $ analog-scrambler descramble secret.analog clear.analog -p "my password"
  $ analog-scrambler decode clear.analog -o clear.gray
  $ analog-scrambler info secret.analog`);

  program
    .command('encode')
    .description('Encode raw video frames into an analog signal file')
    .argument('[input]', 'Raw video file (8-bit gray or rgb24 frames, no header)')
    .option('-o, --output <path>', `Output file (default: output${CONTAINER.FILE_EXTENSION})`, `output${CONTAINER.FILE_EXTENSION}`)
    .option('--pattern', 'Use a generated test pattern instead of an input file')
    .option('--frames <n>', 'Test pattern length in frames (default: 90)', parseInteger)
    .option('--standard <name>', 'Video standard: ntsc or pal (default: ntsc)', parseStandard)
    .option('--sample-rate <hz>', `Sample rate in Hz (default: ${SIGNAL.SAMPLE_RATE})`, parsePositiveNumber)
    .option('--width <px>', `Encoded width (default: ${SIGNAL.WIDTH})`, parseInteger)
    .option('--height <lines>', `Active lines (default: ${SIGNAL.HEIGHT})`, parseInteger)
    .option('--pixel-format <format>', 'Input pixel format: gray or rgb24', 'gray')
    .option('--input-width <px>', 'Input frame width (default: --width)', parseInteger)
    .option('--input-height <px>', 'Input frame height (default: --height)', parseInteger)
    .option('--bandwidth <mhz>', `Video bandwidth in MHz (default: ${SIGNAL.BANDWIDTH_MHZ})`, parsePositiveNumber)
    .option('--max-frames <n>', 'Stop after this many frames', parseInteger)
    .option('--add-noise', 'Add Gaussian noise to the signal')
    .option('--noise-level <v>', `Noise standard deviation in volts (default: ${SIGNAL.NOISE_AMPLITUDE})`, parsePositiveNumber)
    .option('-q, --quiet', 'Suppress progress output')
    .option('-v, --verbose', 'Show debug output')
    .addHelpText('after', `
Raw video can be produced with ffmpeg:
  $ ffmpeg -i input.mp4 -f rawvideo -pix_fmt gray -s 640x480 input.gray
  $ analog-scrambler encode input.gray -o input.analog`)
    .action(encodeCommand);

  addKeyedOptions(
    program
      .command('scramble')
      .description('Scramble the active video of an analog signal file')
      .argument('<input>', 'Analog signal file')
      .argument('<output>', 'Scrambled output file')
  ).action(scrambleCommand);

  addKeyedOptions(
    program
      .command('descramble')
      .description('Reverse scrambling with the same key')
      .argument('<input>', 'Scrambled analog signal file')
      .argument('<output>', 'Descrambled output file')
  ).addHelpText('after', `
Operations, segment count and geometry are read from the input file
unless given on the command line.`)
    .action(descrambleCommand);

  program
    .command('decode')
    .description('Decode an analog signal file back to frames')
    .argument('<input>', 'Analog signal file')
    .option('-o, --output <path>', 'Write raw video (gray, or rgb24 with --rgb)')
    .option('--rgb', 'Write three-channel frames')
    .option('--frames-dir <dir>', 'Write one PGM image per frame')
    .option('--max-frames <n>', 'Stop after this many frames', parseInteger)
    .option('--analyze [every]', 'Log sync statistics every N frames (default: 30)', parseInteger)
    .option('-q, --quiet', 'Suppress progress output')
    .option('-v, --verbose', 'Show debug output')
    .action(decodeCommand);

  program
    .command('info')
    .description('Show the metadata of an analog signal file')
    .argument('<input>', 'Analog signal file')
    .option('--json', 'Output as JSON')
    .action(infoCommand);

  program
    .command('wav')
    .description('Export frames as a 32-bit float WAV file for inspection')
    .argument('<input>', 'Analog signal file')
    .argument('<output>', 'WAV file')
    .option('--start <n>', 'First frame', parseInteger, 0)
    .option('--frames <n>', 'Number of frames', parseInteger, 1)
    .option('-q, --quiet', 'Suppress progress output')
    .action(wavCommand);

  return program;
}
