import { expect } from 'chai';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LockFileError } from '../app/src/types';
import { LOCK_FILE_NAME } from '../app/src/config/constants';
import { parseCliArgs, validateCliOptions } from '../app/src/utils/cli-parser';
import { LockFileManager } from '../app/src/utils/lock-file-manager';

describe('parseCliArgs', () => {
  it('reads flags and key=value options', () => {
    const options = parseCliArgs(['node', 'index.ts', '--once', '-v', '--port=4000', '--config=deploy.json', '--log=keeper.log']);

    expect(options).to.deep.equal({
      verbose: true,
      logFile: 'keeper.log',
      configPath: 'deploy.json',
      port: 4000,
      serve: true,
      once: true,
      help: false,
    });
  });

  it('defaults to serving with no overrides', () => {
    expect(parseCliArgs(['node', 'index.ts'])).to.deep.equal({
      verbose: false,
      logFile: null,
      configPath: null,
      port: null,
      serve: true,
      once: false,
      help: false,
    });
    expect(parseCliArgs(['node', 'index.ts', '--no-server', '-h'])).to.include({ serve: false, help: true });
  });

  it('validates the port', () => {
    expect(validateCliOptions(parseCliArgs(['node', 'index.ts', '--port=3001']))).to.equal(null);
    expect(validateCliOptions(parseCliArgs(['node', 'index.ts', '--port=0']))).to.equal('Invalid --port value: 0');
    expect(validateCliOptions(parseCliArgs(['node', 'index.ts', '--port=abc']))).to.equal('Invalid --port value: NaN');
  });
});

describe('LockFileManager', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'keeper-lock-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('parses lock file contents', () => {
    expect(LockFileManager.parse('{"pid":42,"started":"2024-01-01T00:00:00.000Z","args":["--once"]}')).to.deep.equal({
      pid: 42,
      started: '2024-01-01T00:00:00.000Z',
      args: ['--once'],
    });
    expect(LockFileManager.parse('not json')).to.equal(null);
    expect(LockFileManager.parse('{"pid":"42","started":"x","args":[]}')).to.equal(null);
  });

  it('refuses a second instance while the first is running', () => {
    const first = new LockFileManager(dir);
    first.create(['--verbose']);

    expect(first.getLockFilePath()).to.equal(path.join(dir, LOCK_FILE_NAME));
    expect(first.getLockData()?.pid).to.equal(process.pid);
    expect(() => new LockFileManager(dir).create([])).to.throw(LockFileError, 'Keeper is already running');

    first.remove();
    expect(fs.existsSync(path.join(dir, LOCK_FILE_NAME))).to.equal(false);
  });

  it('replaces an unreadable lock file', () => {
    fs.writeFileSync(path.join(dir, LOCK_FILE_NAME), 'garbage');
    const manager = new LockFileManager(dir);

    expect(manager.checkExisting()).to.deep.equal({ exists: true, data: null, isRunning: false });
    manager.create(['--once']);
    expect(LockFileManager.parse(fs.readFileSync(manager.getLockFilePath(), 'utf8'))?.args).to.deep.equal(['--once']);
    manager.remove();
  });
});
