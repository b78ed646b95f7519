import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { locateRootSteps } from './profiles';
import { runProcess } from '../executor/executor';

// Runs the generated root search in a real shell against an extracted-looking tree
let workDir: string;

const touch = async (relative: string) => {
  const file = path.join(workDir, relative);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, '<project/>');
};

const locate = (marker: string) =>
  runProcess('sh', ['-c', [...locateRootSteps(marker), 'pwd'].join(' && ')], { cwd: workDir });

const lastLine = (stdout: string) => stdout.trimEnd().split('\n').pop();

describe('locateRootSteps in a shell', () => {
  beforeEach(async () => {
    workDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'root-search-')));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('prefers a marker at the archive root over a nested one', async () => {
    await touch('pom.xml');
    await touch('module/pom.xml');

    const result = await locate('pom.xml');

    expect(result.exitCode).toBe(0);
    expect(lastLine(result.stdout)).toBe(workDir);
  });

  it('picks the lexically first of two nested candidates', async () => {
    await touch('proj/pom.xml');
    await touch('aaa/pom.xml');

    const result = await locate('pom.xml');

    expect(result.exitCode).toBe(0);
    expect(lastLine(result.stdout)).toBe(path.join(workDir, 'aaa'));
  });

  it('enters a project directory whose name contains spaces', async () => {
    await touch('my project/pom.xml');

    const result = await locate('pom.xml');

    expect(result.exitCode).toBe(0);
    expect(lastLine(result.stdout)).toBe(path.join(workDir, 'my project'));
  });

  it('ignores markers deeper than two levels', async () => {
    await touch('a/b/pom.xml');

    const result = await locate('pom.xml');

    expect(result.exitCode).toBe(66);
  });

  it('exits 66 with a message when no marker exists', async () => {
    await touch('README.md');

    const result = await locate('pom.xml');

    expect(result).toEqual({
      exitCode: 66,
      stdout: '',
      stderr: 'No pom.xml found within two directory levels of the archive root\n',
    });
  });
});
