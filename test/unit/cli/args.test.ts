import { DEFAULT_CONFIG_PATH, UsageError, parseCommand, parseCount } from '../../../lib/cli/args';

describe('parseCommand', () => {
  test.each([[[]], [['--help']], [['pipeline', '-h']]])('returns help for %j', (argv) => {
    expect(parseCommand(argv)).toEqual({ kind: 'help' });
  });

  test('parses a pipeline run with parameter overrides', () => {
    expect(parseCommand(['pipeline', '--action', 'run', '--wait', '--n-clusters', '4', '--data-file', 'q3.csv', '--json']))
      .toEqual({
        kind: 'pipeline',
        configPath: DEFAULT_CONFIG_PATH,
        json: true,
        action: 'run',
        wait: true,
        parameters: { clusterCount: 4, dataFile: 'q3.csv' },
      });
  });

  test('requires a pipeline action', () => {
    expect(() => parseCommand(['pipeline', '--action', 'destroy'])).toThrow('pipeline needs --action deploy or --action run');
  });

  test('parses an endpoint deploy', () => {
    expect(parseCommand(['endpoint', 'deploy', '--training-job-id', 'job-1', '--instance-count', '2', '--config', 'prod.json']))
      .toEqual({
        kind: 'endpoint-deploy',
        configPath: 'prod.json',
        json: false,
        trainingJobId: 'job-1',
        instanceCount: 2,
      });
  });

  test('requires an artifact source for endpoint deploy', () => {
    expect(() => parseCommand(['endpoint', 'deploy'])).toThrow('endpoint deploy needs --training-job-id or --artifact-uri');
  });

  test('leaves updateIfExists to the config unless the flag is given', () => {
    expect(parseCommand(['genai', 'deploy'])).toEqual({ kind: 'genai-deploy', configPath: DEFAULT_CONFIG_PATH, json: false });
    expect(parseCommand(['genai', 'deploy', '--update-if-exists'])).toMatchObject({ updateIfExists: true });
  });

  test('parses a function smoke test with a prompt', () => {
    expect(parseCommand(['smoke', 'function', '--text', 'hello'])).toEqual({
      kind: 'smoke',
      configPath: DEFAULT_CONFIG_PATH,
      json: false,
      target: 'function',
      text: 'hello',
    });
  });

  test('parses deliver', () => {
    expect(parseCommand(['deliver', '--skip-smoke-tests'])).toMatchObject({ kind: 'deliver', skipSmokeTests: true });
  });

  test.each([
    [['launch'], 'Unknown command "launch"'],
    [['smoke', 'lambda'], 'smoke needs one of: endpoint, function'],
    [['genai'], 'genai needs one of: deploy'],
    [['deliver', 'now'], 'Unexpected argument "now" for deliver'],
    [['smoke', 'endpoint', 'extra'], 'Unexpected argument "extra"'],
  ])('rejects %j', (argv, message) => {
    expect(() => parseCommand(argv)).toThrow(new UsageError(message));
  });

  test('turns an unknown option into a usage error', () => {
    expect(() => parseCommand(['deliver', '--bogus'])).toThrow(UsageError);
  });
});

describe('parseCount', () => {
  test('accepts positive integers', () => {
    expect(parseCount('12', 'n-clusters')).toBe(12);
    expect(parseCount(undefined, 'n-clusters')).toBeUndefined();
  });

  test.each(['0', '2.5', '-1', 'three'])('rejects %s', (value) => {
    expect(() => parseCount(value, 'n-clusters')).toThrow(`--n-clusters must be a positive integer, got "${value}"`);
  });
});
