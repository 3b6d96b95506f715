import type { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';

import { createSortCommand } from '../src/commands/sort';

vi.mock('node:fs/promises');

const UNSORTED = 'locals {\n  b = 1\n  a = 2\n}\n';
const SORTED = 'locals {\n\n  a = 2\n  b = 1\n}\n';

async function run(...args: string[]): Promise<void> {
  const command = createSortCommand();
  try {
    await command.parseAsync(['node', 'tfsort', ...args]);
  } catch {
    // process.exit is mocked to throw
  }
}

describe('Sort Command', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;
  let processExitSpy: MockInstance<typeof process.exit>;
  let stdoutSpy: MockInstance<typeof process.stdout.write>;

  beforeEach(() => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('ProcessExit');
    });
    stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    vi.mocked(fs.stat).mockResolvedValue({ isDirectory: () => false } as unknown as Stats);
    vi.mocked(fs.readFile).mockResolvedValue(UNSORTED);
    vi.mocked(fs.writeFile).mockResolvedValue(undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print the sorted configuration by default', async () => {
    await run('/work/main.tf');

    expect(stdoutSpy).toHaveBeenCalledWith(SORTED);
    expect(fs.writeFile).not.toHaveBeenCalled();
    expect(processExitSpy).not.toHaveBeenCalled();
  });

  it('should write sorted content back with --write', async () => {
    await run('/work/main.tf', '--write');

    expect(fs.writeFile).toHaveBeenCalledWith('/work/main.tf', SORTED, 'utf8');
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('Sorted'));
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('Sorted 1 file(s), 0 unchanged, 0 failed.'));
    expect(processExitSpy).not.toHaveBeenCalled();
  });

  it('should not rewrite a file that is already sorted', async () => {
    vi.mocked(fs.readFile).mockResolvedValue(SORTED);

    await run('/work/main.tf', '--write');

    expect(fs.writeFile).not.toHaveBeenCalled();
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('(unchanged)'));
  });

  it('should pass the check for a sorted file with CRLF line endings', async () => {
    vi.mocked(fs.readFile).mockResolvedValue('locals {\r\n\r\n  a = 2\r\n  b = 1\r\n}\r\n');

    await run('/work/main.tf', '--check');

    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('Checked 1 file(s): 0 not sorted, 0 failed.'));
    expect(processExitSpy).not.toHaveBeenCalled();
  });

  it('should not rewrite a sorted file that starts with a byte order mark', async () => {
    vi.mocked(fs.readFile).mockResolvedValue(`\uFEFF${SORTED}`);

    await run('/work/main.tf', '--write');

    expect(fs.writeFile).not.toHaveBeenCalled();
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('(unchanged)'));
  });

  it('should fail the check when a file is not sorted', async () => {
    await run('/work/main.tf', '--check');

    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('is not sorted'));
    expect(fs.writeFile).not.toHaveBeenCalled();
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });

  it('should pass the check when every file is sorted', async () => {
    vi.mocked(fs.readFile).mockResolvedValue(SORTED);

    await run('/work/main.tf', '--check');

    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('Checked 1 file(s): 0 not sorted, 0 failed.'));
    expect(processExitSpy).not.toHaveBeenCalled();
  });

  it('should honour the --blocks option', async () => {
    vi.mocked(fs.readFile).mockResolvedValue('module "b" {}\nmodule "a" {}\n');

    await run('/work/main.tf', '--blocks', 'module');

    expect(stdoutSpy).toHaveBeenCalledWith('module "a" {}\n\nmodule "b" {}\n');
  });

  it('should report parse errors and keep going', async () => {
    vi.mocked(fs.readFile).mockResolvedValueOnce('locals {\n').mockResolvedValueOnce(UNSORTED);

    await run('/work/broken.tf', '/work/main.tf', '--write');

    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining('broken.tf'), expect.stringContaining('error parsing HCL content from'));
    expect(fs.writeFile).toHaveBeenCalledWith('/work/main.tf', SORTED, 'utf8');
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });

  it('should reject --write together with --check', async () => {
    await run('/work/main.tf', '--write', '--check');

    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining('✗'), '--write and --check cannot be used together');
    expect(fs.readFile).not.toHaveBeenCalled();
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });

  it('should fail when no configuration files are found', async () => {
    vi.mocked(fs.stat).mockResolvedValue({ isDirectory: () => true } as unknown as Stats);
    vi.mocked(fs.readdir).mockResolvedValue([] as never);

    await run('/work');

    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('No Terraform files found'));
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });
});
