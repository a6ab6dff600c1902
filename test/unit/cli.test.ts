import { tmpdir } from 'node:os';
import { formatFailure, parseCliOptions, type CliOutput } from '../../src/cli.js';
import { NotifierError, NotifierErrorCode, NotSupportedError } from '../../src/shared/errors.js';
import { catchError } from '../helpers/catch-error.js';

const argv = (...args: string[]): string[] => ['node', 'updates-notifier', ...args];

function captureOutput(): CliOutput & { out: string; err: string } {
  const sink = {
    out: '',
    err: '',
    writeOut(text: string): void {
      sink.out += text;
    },
    writeErr(text: string): void {
      sink.err += text;
    },
  };
  return sink;
}

describe('parseCliOptions', () => {
  it('returns defaults when no options are given', () => {
    expect(parseCliOptions(argv())).toEqual({
      kind: 'run',
      options: { config: undefined, distro: undefined, prefix: '' },
    });
  });

  it('reads short and long options', () => {
    const prefix = tmpdir();
    expect(parseCliOptions(argv('-c', 'bot.yaml', '--distro', 'arch', '-p', prefix))).toEqual({
      kind: 'run',
      options: { config: 'bot.yaml', distro: 'arch', prefix },
    });
    expect(parseCliOptions(argv('--config=other.json', '-d', 'suse'))).toEqual({
      kind: 'run',
      options: { config: 'other.json', distro: 'suse', prefix: '' },
    });
  });

  it('prints help and exits 0', () => {
    const output = captureOutput();
    expect(parseCliOptions(argv('--help'), output)).toEqual({ kind: 'exit', exitCode: 0 });
    expect(output.out).toContain('Usage: updates-notifier [options]');
    expect(output.out).toContain('-d, --distro <family>');
  });

  it('prints the version and exits 0', () => {
    const output = captureOutput();
    expect(parseCliOptions(argv('-v'), output)).toEqual({ kind: 'exit', exitCode: 0 });
    expect(output.out).toBe('updates-notifier 1.0.0\n');
  });

  it('rejects an unknown option with a help hint', () => {
    const output = captureOutput();
    const err = catchError(() => parseCliOptions(argv('--bogus'), output));
    expect(err).toMatchObject({
      code: NotifierErrorCode.INVALID_OPTION,
      message: "unknown option '--bogus'",
      remediation: ["Try 'updates-notifier --help' or 'updates-notifier -h' for more information."],
    });
    expect(output.err).toBe('');
  });

  it('rejects an option missing its value', () => {
    const err = catchError(() => parseCliOptions(argv('-d'), captureOutput()));
    expect(err).toMatchObject({ code: NotifierErrorCode.INVALID_OPTION });
  });

  it('rejects positional arguments', () => {
    const err = catchError(() => parseCliOptions(argv('extra'), captureOutput()));
    expect(err).toMatchObject({ code: NotifierErrorCode.INVALID_OPTION });
  });

  it('rejects a prefix that does not exist', () => {
    const err = catchError(() => parseCliOptions(argv('-p', '/nonexistent/updates-notifier-prefix')));
    expect(err).toMatchObject({
      code: NotifierErrorCode.INVALID_PREFIX,
      message: "the specified prefix path '/nonexistent/updates-notifier-prefix' does not exist.",
    });
  });
});

describe('formatFailure', () => {
  it('prints the message followed by the remediation lines', () => {
    expect(formatFailure(new NotSupportedError('plan9'))).toBe(
      [
        "updates-notifier: the distro 'plan9' is not (yet) supported.",
        '',
        'The possible distro/family values are arch, debian, gentoo, rhel, suse.',
      ].join('\n'),
    );
  });

  it('prints only the message when there is no remediation', () => {
    const err = new NotifierError(NotifierErrorCode.COMMAND_SPAWN_FAILED, 'Command failed to spawn: x');
    expect(formatFailure(err)).toBe('updates-notifier: Command failed to spawn: x');
  });
});
