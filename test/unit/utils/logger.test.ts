import { LogLevel, createLogger, flattenError, parseLogLevel, setLogLevel, stdoutSink } from '../../../lib/utils/logger';
import { CapturedLogs, captureLogs } from '../../helpers/capture-logs';

describe('logger', () => {
  let logs: CapturedLogs;

  beforeEach(() => {
    logs = captureLogs();
    setLogLevel(LogLevel.Info);
  });

  afterEach(() => {
    logs.restore();
    setLogLevel(LogLevel.Info);
  });

  test('merges bound, child and call fields', () => {
    createLogger({ service: 'test' }).child({ component: 'prober' }).info('probed', { endpointName: 'seg-endpoint' });

    expect(logs.records).toHaveLength(1);
    expect(logs.records[0]).toMatchObject({
      level: LogLevel.Info,
      msg: 'probed',
      fields: { service: 'test', component: 'prober', endpointName: 'seg-endpoint' },
    });
  });

  test('call fields win over bound fields', () => {
    createLogger({ component: 'a' }).warn('x', { component: 'b' });
    expect(logs.records[0].fields).toEqual({ component: 'b' });
  });

  test('drops records below the threshold', () => {
    const log = createLogger();
    log.debug('hidden');
    setLogLevel(LogLevel.Error);
    log.warn('hidden too');
    log.error('shown');

    expect(logs.messages()).toEqual(['shown']);
  });

  test('stamps records with an ISO time', () => {
    createLogger().info('stamped');
    expect(logs.records[0].time).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });
});

describe('stdoutSink', () => {
  test('writes one JSON line with errors flattened', () => {
    const write = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    try {
      stdoutSink({
        level: LogLevel.Error,
        time: '2026-03-01T10:00:00.000Z',
        msg: 'deployment did not complete',
        fields: { endpointName: 'seg-endpoint', error: new RangeError('too slow') },
      });

      expect(write).toHaveBeenCalledTimes(1);
      expect(write.mock.calls[0][0]).toBe(
        '{"level":"error","time":"2026-03-01T10:00:00.000Z","msg":"deployment did not complete",'
        + '"endpointName":"seg-endpoint","error":{"name":"RangeError","message":"too slow"}}\n',
      );
    } finally {
      write.mockRestore();
    }
  });
});

describe('flattenError', () => {
  test('follows the cause chain', () => {
    const error = new Error('update rejected', { cause: new Error('throttled') });
    expect(flattenError(error)).toEqual({
      name: 'Error',
      message: 'update rejected',
      cause: { name: 'Error', message: 'throttled' },
    });
  });

  test('stringifies a non-error cause', () => {
    expect(flattenError(new Error('failed', { cause: 503 }))).toEqual({ name: 'Error', message: 'failed', cause: '503' });
  });
});

describe('parseLogLevel', () => {
  test.each([
    ['debug', LogLevel.Debug],
    ['INFO', LogLevel.Info],
    [' Warn ', LogLevel.Warn],
    ['error', LogLevel.Error],
  ])('reads %s', (value, level) => {
    expect(parseLogLevel(value)).toBe(level);
  });

  test('ignores unknown or missing values', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
