/**
 * Scan Command Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { Command } from 'commander';
import { join } from 'path';
import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { createScanCommand } from '../scan.js';
import { setOutputOptions } from '../../utils/output.js';

const TEMPLATE = 'data/run{run:d}_p{parameter:d}.csv';

describe('scan command', () => {
  let program: Command;
  let tempDir: string;
  let configPath: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'pathgrid-scan-'));
    configPath = join(tempDir, 'config.json');
    await mkdir(join(tempDir, 'data'));
    for (const name of ['run1_p10.csv', 'run1_p20.csv', 'run2_p10.csv', 'run2_p20.csv']) {
      await writeFile(join(tempDir, 'data', name), '');
    }

    setOutputOptions({ json: false, verbose: false });
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    program = new Command();
    program.addCommand(createScanCommand(() => configPath));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    setOutputOptions({ json: false });
    await rm(tempDir, { recursive: true, force: true });
  });

  function scan(...args: string[]): Promise<Command> {
    return program.parseAsync(['node', 'test', 'scan', ...args]);
  }

  function printed(): string {
    return logSpy.mock.calls.map((call) => String(call[0])).join('\n');
  }

  function mockExit(): MockInstance<typeof process.exit> {
    return vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('exit called');
    });
  }

  it('prints an aligned table of every match', async () => {
    await scan(TEMPLATE, '1', '--cwd', tempDir);

    expect(printed()).toBe(
      [
        'path               run  parameter',
        '---------------------------------',
        'data/run1_p10.csv  1    10',
        'data/run1_p20.csv  1    20',
      ].join('\n')
    );
  });

  it('keeps every row when no --where is given', async () => {
    await scan(TEMPLATE, '--cwd', tempDir, '--format', 'csv');

    expect(printed()).toBe(
      [
        'path,run,parameter',
        'data/run1_p10.csv,1,10',
        'data/run1_p20.csv,1,20',
        'data/run2_p10.csv,2,10',
        'data/run2_p20.csv,2,20',
      ].join('\n')
    );
  });

  it('keeps rows matching any --where by default', async () => {
    await scan(TEMPLATE, '--cwd', tempDir, '--format', 'csv', '--where', 'run=1', '--where', 'parameter=20');

    expect(printed()).toBe(
      [
        'path,run,parameter',
        'data/run1_p10.csv,1,10',
        'data/run1_p20.csv,1,20',
        'data/run2_p20.csv,2,20',
      ].join('\n')
    );
  });

  it('keeps rows matching every --where with --match all', async () => {
    await scan(TEMPLATE, '--cwd', tempDir, '--format', 'csv', '--match', 'all', '--where', 'run=1', '--where', 'parameter=20');

    expect(printed()).toBe(['path,run,parameter', 'data/run1_p20.csv,1,20'].join('\n'));
  });

  it('accepts a list of values in one --where', async () => {
    await scan(TEMPLATE, '--cwd', tempDir, '--format', 'csv', '--where', 'parameter=10,30');

    expect(printed()).toBe(['path,run,parameter', 'data/run1_p10.csv,1,10', 'data/run2_p10.csv,2,10'].join('\n'));
  });

  it('binds values with --set', async () => {
    await scan(TEMPLATE, '--cwd', tempDir, '--format', 'csv', '--set', 'parameter=20');

    expect(printed()).toBe(['path,run,parameter', 'data/run1_p20.csv,1,20', 'data/run2_p20.csv,2,20'].join('\n'));
  });

  it('resolves @aliases and applies config defaults', async () => {
    await writeFile(
      configPath,
      JSON.stringify({
        version: 1,
        templates: { runs: TEMPLATE },
        defaults: { format: 'csv', match: 'all', cwd: tempDir },
      })
    );

    await scan('@runs', '--where', 'run=2', '--where', 'parameter=10');

    expect(printed()).toBe(['path,run,parameter', 'data/run2_p10.csv,2,10'].join('\n'));
  });

  it('lets options override config defaults', async () => {
    await writeFile(configPath, JSON.stringify({ version: 1, templates: {}, defaults: { format: 'csv', match: 'all' } }));

    await scan(TEMPLATE, '--cwd', tempDir, '--match', 'any', '--where', 'run=2', '--where', 'parameter=10', '--format', 'json');

    expect(JSON.parse(printed())).toEqual([
      { path: 'data/run1_p10.csv', run: 1, parameter: 10 },
      { path: 'data/run2_p10.csv', run: 2, parameter: 10 },
      { path: 'data/run2_p20.csv', run: 2, parameter: 20 },
    ]);
  });

  it('prints rows as JSON with --json', async () => {
    setOutputOptions({ json: true });

    await scan(TEMPLATE, '2', '--cwd', tempDir);

    expect(JSON.parse(printed())).toEqual([
      { path: 'data/run2_p10.csv', run: 2, parameter: 10 },
      { path: 'data/run2_p20.csv', run: 2, parameter: 20 },
    ]);
  });

  it('prints only the header when nothing matches', async () => {
    await scan(TEMPLATE, '9', '--cwd', tempDir, '--format', 'csv');

    expect(printed()).toBe('path,run,parameter');
  });

  it('exits with 1 on a value that does not fit its placeholder', async () => {
    const exitSpy = mockExit();

    await expect(scan(TEMPLATE, 'one', '--cwd', tempDir)).rejects.toThrow('exit called');

    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(errorSpy.mock.calls).toEqual([['Error: Scan failed'], ['  Field "run" expects an integer, got "one"']]);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('exits with 1 on an unknown --where column', async () => {
    const exitSpy = mockExit();

    await expect(scan(TEMPLATE, '--cwd', tempDir, '--where', 'rn=1')).rejects.toThrow('exit called');

    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(errorSpy.mock.calls[1]).toEqual([
      '  Unknown column "rn"; available: path, run, parameter (did you mean: run?)',
    ]);
  });

  it('exits with 1 on an unknown alias', async () => {
    const exitSpy = mockExit();

    await expect(scan('@missing', '--cwd', tempDir)).rejects.toThrow('exit called');

    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(errorSpy.mock.calls[1]).toEqual(['  Unknown template alias "@missing"']);
  });

  it('reports errors as JSON with --json', async () => {
    setOutputOptions({ json: true });
    mockExit();

    await expect(scan(TEMPLATE, '--cwd', tempDir, '--match', 'both')).rejects.toThrow('exit called');

    expect(JSON.parse(String(errorSpy.mock.calls[0][0]))).toEqual({
      error: 'Scan failed',
      type: 'Error',
      details: 'Invalid --match "both" (expected any or all)',
    });
  });
});
