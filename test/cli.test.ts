import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { access, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { runCli } from '../src/cli.js';

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('mipsasm CLI', () => {
  let dir: string;
  let stdout: string[];
  let stderr: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'mipsasm-cli-'));
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderr.push(String(chunk));
      return true;
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('prints usage for --help', async () => {
    expect(await runCli(['--help'])).toBe(0);
    expect(stdout.join('')).toContain('mipsasm [options] <entry.asm>');
  });

  it('prints the package version', async () => {
    expect(await runCli(['-V'])).toBe(0);
    expect(stdout.join('')).toBe('0.1.0\n');
  });

  it('exits 2 without an entry file', async () => {
    expect(await runCli([])).toBe(2);
    expect(stderr[0]).toBe(
      'mipsasm: Expected exactly one <entry.asm> argument (and it must be last)\n',
    );
  });

  it('exits 2 for an unsupported byte order', async () => {
    expect(await runCli(['--endian', 'middle', 'prog.asm'])).toBe(2);
    expect(stderr[0]).toBe('mipsasm: Unsupported --endian "middle" (expected big|little)\n');
  });

  it('writes every artifact next to the chosen output', async () => {
    const entry = join(dir, 'prog.asm');
    await writeFile(entry, 'start: li t0, 1\nj start\nnop\n', 'utf8');

    const out = join(dir, 'out', 'prog.hex');
    expect(await runCli(['-o', out, entry])).toBe(0);
    expect(stdout.join('')).toBe(`${out}\n`);
    expect(stderr).toEqual([]);

    const bin = await readFile(join(dir, 'out', 'prog.bin'));
    expect([...bin.subarray(0, 4)]).toEqual([0x24, 0x08, 0x00, 0x01]);
    expect(await exists(join(dir, 'out', 'prog.lst'))).toBe(true);
  });

  it('suppresses artifacts on request', async () => {
    const entry = join(dir, 'prog.asm');
    await writeFile(entry, 'nop\n', 'utf8');

    expect(await runCli(['-t', 'bin', '--nohex', '-n', entry])).toBe(0);
    expect(stdout.join('')).toBe(`${join(dir, 'prog.bin')}\n`);
    expect(await exists(join(dir, 'prog.hex'))).toBe(false);
    expect(await exists(join(dir, 'prog.lst'))).toBe(false);
  });

  it('exits 1 and prints diagnostics for a bad program', async () => {
    const entry = join(dir, 'bad.asm');
    await writeFile(entry, 'nop\nfrob t0\n', 'utf8');

    expect(await runCli([entry])).toBe(1);
    expect(stderr).toEqual([`${entry}:2: Error: unexpected token (unknown instruction?)\n`]);
    expect(await exists(join(dir, 'bad.hex'))).toBe(false);
  });
});
