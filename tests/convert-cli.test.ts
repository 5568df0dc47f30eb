import { afterEach, describe, expect, it, vi } from 'vitest';

async function runCli(args: string[], convertExport: (...a: unknown[]) => Promise<unknown>) {
  vi.resetModules();
  vi.doMock('../src/env.js', () => ({ env: { DEBUG: false } }));
  vi.doMock('../src/converter.js', async (importOriginal) => {
    const actual = await importOriginal<typeof import('../src/converter.js')>();
    return { ...actual, convertExport };
  });

  const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
  const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

  const originalArgv = process.argv;
  process.argv = ['node', 'convert', ...args];
  try {
    await import('../src/convert.js');
    await vi.waitFor(() => expect(exitSpy).toHaveBeenCalled());
  } finally {
    process.argv = originalArgv;
  }

  return { exitSpy, logSpy, errorSpy };
}

describe('convert CLI', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.doUnmock('../src/env.js');
    vi.doUnmock('../src/converter.js');
  });

  it('converts and exits cleanly', async () => {
    const convertExport = vi.fn(async () => ({ links: 3, skipped: 1, collections: 1, outputPath: 'out.json' }));

    const { exitSpy, logSpy } = await runCli(['in.json', '-o', 'out.json', '--user-id', '2'], convertExport);

    expect(convertExport).toHaveBeenCalledWith({
      inputPath: 'in.json',
      outputPath: 'out.json',
      userId: 2,
      collectionColor: null,
    });
    expect(logSpy).toHaveBeenCalledWith('Converted 3 bookmarks into 1 Linkwarden collection(s) -> out.json');
    expect(logSpy).toHaveBeenCalledWith('Skipped 1 non-link bookmark(s)');
    expect(exitSpy).toHaveBeenCalledWith(0);
  });

  it('exits with 1 and reports conversion errors', async () => {
    const convertExport = vi.fn(async () => {
      // same module instance the freshly loaded CLI sees
      const { ConvertError } = await import('../src/utils/errors.js');
      throw new ConvertError('parse', 'Invalid JSON in in.json: Unexpected end of JSON input');
    });

    const { exitSpy, errorSpy } = await runCli(['in.json', '-o', 'out.json'], convertExport);

    expect(errorSpy).toHaveBeenCalledWith('Error: Invalid JSON in in.json: Unexpected end of JSON input');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('exits with 2 on usage errors without converting', async () => {
    const convertExport = vi.fn(async () => ({}));

    const { exitSpy, errorSpy } = await runCli(['in.json'], convertExport);

    expect(convertExport).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith('Error: Missing required option --output\n');
    expect(exitSpy).toHaveBeenCalledWith(2);
  });

  it('prints usage and exits 0 for --help', async () => {
    const convertExport = vi.fn(async () => ({}));

    const { exitSpy, logSpy } = await runCli(['--help'], convertExport);

    expect(convertExport).not.toHaveBeenCalled();
    expect(logSpy.mock.calls[0]?.[0]).toMatch(/^Usage: hoarder-to-linkwarden /);
    expect(exitSpy).toHaveBeenCalledWith(0);
  });
});
