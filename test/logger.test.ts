import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { Logger, logfileName, stripAnsi } from '../src/utils/logger';

describe('stripAnsi', () => {
  test('removes colour codes', () => {
    expect(stripAnsi('\u001b[32m+ created\u001b[0m')).toBe('+ created');
  });
});

describe('logfileName', () => {
  test('uses the local date', () => {
    expect(logfileName(new Date(2024, 4, 1, 12))).toBe('2024-05-01.log');
  });
});

describe('Logger', () => {
  let logDirectory: string;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logDirectory = fs.mkdtempSync(path.join(os.tmpdir(), 'dsh-logger-'));
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('filters the console by level but writes everything to file', () => {
    const logger = new Logger({ logDirectory, consoleLevel: 'warning' });
    logger.debug('hidden detail');
    logger.info('hidden info');
    logger.warning('careful');

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('careful');

    const lines = fs.readFileSync(logger.logFilePath, 'utf8').trimEnd().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+ DEBUG hidden detail$/);
    expect(lines[2]).toMatch(/ WARNING careful$/);
  });

  test('prefixes the level when asked', () => {
    const logger = new Logger({ logDirectory, showLevel: true });
    logger.info('hello');
    expect(logSpy).toHaveBeenCalledWith('INFO     hello');
  });

  test('strips colour codes from the log file', () => {
    const logger = new Logger({ logDirectory });
    logger.info('\u001b[1mbold\u001b[0m');
    expect(fs.readFileSync(logger.logFilePath, 'utf8')).toMatch(/ INFO bold\n$/);
  });
});
