/**
 * Tests for the migrate command line
 */

import { mkdtemp, rm } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { parseArgs, runCli, loadMigrations, USAGE, CliOutput } from '../migrate';
import { silentLogger } from '../../utils/logger';

const fixtures = path.join(__dirname, 'fixtures');

function captureOutput() {
  const out: string[] = [];
  const err: string[] = [];
  const output: CliOutput = {
    out: line => out.push(line),
    err: line => err.push(line)
  };
  return { out, err, output };
}

describe('parseArgs', () => {
  it('should parse to with and without a target', () => {
    expect(parseArgs(['to'])).toEqual({ command: 'to', target: '', migrationsModule: undefined });
    expect(parseArgs(['to', '20200101T000000Z', '--migrations', './m.js'])).toEqual({
      command: 'to',
      target: '20200101T000000Z',
      migrationsModule: './m.js'
    });
  });

  it('should parse status and help', () => {
    expect(parseArgs(['status', '--migrations=./m.js'])).toEqual({ command: 'status', migrationsModule: './m.js' });
    expect(parseArgs([])).toEqual({ command: 'help' });
    expect(parseArgs(['to', '-h'])).toEqual({ command: 'help' });
  });

  it('should reject unknown commands and stray arguments', () => {
    expect(() => parseArgs(['sideways'])).toThrow('Unknown command: sideways');
    expect(() => parseArgs(['up'])).toThrow('Unknown command: up');
    expect(() => parseArgs(['status', 'extra'])).toThrow('Unexpected arguments: extra');
    expect(() => parseArgs(['to', 'a', 'b'])).toThrow('Unexpected arguments: b');
    expect(() => parseArgs(['to', '--migrations'])).toThrow('--migrations requires a module path');
  });
});

describe('loadMigrations', () => {
  it('should build a frozen registry from the module', async () => {
    const registry = await loadMigrations(path.join(fixtures, 'migrations'));

    expect(registry.sortedVersions()).toEqual(['00010101T000000Z', '20200101T000000Z', '20200201T000000Z']);
    expect(registry.isFrozen()).toBe(true);
  });

  it('should reject modules without registerMigrations', async () => {
    await expect(loadMigrations('notMigrations', fixtures)).rejects.toThrow(
      'notMigrations does not export registerMigrations(registry)'
    );
  });
});

describe('runCli', () => {
  let tempDirectory: string;
  let env: Record<string, string>;

  beforeEach(async () => {
    tempDirectory = await mkdtemp(path.join(os.tmpdir(), 'migrator-cli-'));
    env = {
      DATABASE_TYPE: 'sqlite',
      DATABASE_PATH: path.join(tempDirectory, 'test.db'),
      MIGRATIONS_MODULE: path.join(fixtures, 'migrations')
    };
  });

  afterEach(async () => {
    await rm(tempDirectory, { recursive: true, force: true });
  });

  it('should print usage for help', async () => {
    const { out, output } = captureOutput();

    expect(await runCli(['help'], { env, output, logger: silentLogger })).toBe(0);
    expect(out).toEqual([USAGE]);
  });

  it('should migrate up, report status, then migrate down', async () => {
    const first = captureOutput();
    expect(await runCli(['to'], { env, output: first.output, logger: silentLogger })).toBe(0);
    expect(first.out).toEqual(['Applied: 20200101T000000Z, 20200201T000000Z']);

    const again = captureOutput();
    expect(await runCli(['to'], { env, output: again.output, logger: silentLogger })).toBe(0);
    expect(again.out).toEqual(['Already at 20200201T000000Z']);

    const down = captureOutput();
    expect(await runCli(['to', '20200101T000000Z'], { env, output: down.output, logger: silentLogger })).toBe(0);
    expect(down.out).toEqual(['Reverted: 20200201T000000Z']);

    const report = captureOutput();
    expect(await runCli(['status'], { env, output: report.output, logger: silentLogger })).toBe(0);
    expect(report.out).toEqual([
      '[ ] 00010101T000000Z nil',
      '[x] 20200101T000000Z create_users',
      '[ ] 20200201T000000Z create_posts'
    ]);
  });

  it('should create the directory of a new database file', async () => {
    const { out, output } = captureOutput();
    env.DATABASE_PATH = path.join(tempDirectory, 'data', 'migrator.db');

    expect(await runCli(['to', '20200101T000000Z'], { env, output, logger: silentLogger })).toBe(0);
    expect(out).toEqual(['Applied: 20200101T000000Z']);
  });

  it('should print registration problems and fail', async () => {
    const { err, output } = captureOutput();
    env.MIGRATIONS_MODULE = path.join(fixtures, 'duplicateMigrations');

    expect(await runCli(['to'], { env, output, logger: silentLogger })).toBe(1);
    expect(err).toEqual(['migration 20200101T000000Z is registered more than once']);
  });

  it('should fail without a migrations module', async () => {
    const { err, output } = captureOutput();
    delete env.MIGRATIONS_MODULE;

    expect(await runCli(['status'], { env, output, logger: silentLogger })).toBe(1);
    expect(err).toEqual(['No migrations module given; pass --migrations or set MIGRATIONS_MODULE']);
  });

  it('should print usage after a bad command', async () => {
    const { err, output } = captureOutput();

    expect(await runCli(['sideways'], { env, output, logger: silentLogger })).toBe(1);
    expect(err).toEqual(['Unknown command: sideways', USAGE]);
  });
});
