// lib/cli/args.ts
import { parseArgs } from 'node:util';
import { describeError } from '../endpoint-lifecycle/errors';
import { PipelineRunParameters } from '../pipeline/pipeline-definition';

export const DEFAULT_CONFIG_PATH = 'config/app-config.json';

export const HELP = `
Usage: segment-delivery <command> [options]

Commands:
  pipeline --action deploy|run     Create/update the training pipeline, or start an execution
  endpoint deploy                  Create or update the serving endpoint on a trained artifact
  genai deploy                     Create or update the Bedrock text-generation function
  smoke endpoint|function          Invoke the endpoint or the function and check the response
  deliver                          Pipeline deploy, run, wait, GenAI deploy and smoke tests

Options:
  --config <path>                  App config file (default ${DEFAULT_CONFIG_PATH}); CONFIG_BUCKET/CONFIG_KEY read it from S3
  --json                           Print the result as JSON
  --help                           Show this help

pipeline:
  --action deploy|run              Required
  --wait                           With run: wait for the execution to finish
  --n-clusters <n>  --n-components <n>  --data-file <name>
  --training-instance-type <type>  --inference-instance-type <type>

endpoint deploy:
  --endpoint-name <name>           Defaults to Endpoint.Name from the config
  --training-job-id <id> | --artifact-uri <s3 uri>
  --model-name <name>              Use an existing model instead of creating one
  --instance-type <type>  --instance-count <n>

genai deploy:
  --update-if-exists               Update the function when it already exists (default GenAi.UpdateIfExists)

smoke:
  --endpoint-name <name>  --function-name <name>  --text <prompt>

deliver:
  --skip-smoke-tests
`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

interface CommonOptions {
  readonly configPath: string;
  readonly json: boolean;
}

export type CliCommand =
  | { readonly kind: 'help' }
  | (CommonOptions & {
    readonly kind: 'pipeline';
    readonly action: 'deploy' | 'run';
    readonly wait: boolean;
    readonly parameters: PipelineRunParameters;
  })
  | (CommonOptions & {
    readonly kind: 'endpoint-deploy';
    readonly endpointName?: string;
    readonly trainingJobId?: string;
    readonly artifactUri?: string;
    readonly modelName?: string;
    readonly instanceType?: string;
    readonly instanceCount?: number;
  })
  | (CommonOptions & { readonly kind: 'genai-deploy'; readonly updateIfExists?: boolean })
  | (CommonOptions & {
    readonly kind: 'smoke';
    readonly target: 'endpoint' | 'function';
    readonly endpointName?: string;
    readonly functionName?: string;
    readonly text?: string;
  })
  | (CommonOptions & { readonly kind: 'deliver'; readonly skipSmokeTests: boolean });

const OPTIONS = {
  config: { type: 'string' },
  json: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
  action: { type: 'string' },
  wait: { type: 'boolean' },
  'n-clusters': { type: 'string' },
  'n-components': { type: 'string' },
  'data-file': { type: 'string' },
  'training-instance-type': { type: 'string' },
  'inference-instance-type': { type: 'string' },
  'endpoint-name': { type: 'string' },
  'training-job-id': { type: 'string' },
  'artifact-uri': { type: 'string' },
  'model-name': { type: 'string' },
  'instance-type': { type: 'string' },
  'instance-count': { type: 'string' },
  'update-if-exists': { type: 'boolean' },
  'function-name': { type: 'string' },
  text: { type: 'string' },
  'skip-smoke-tests': { type: 'boolean' },
} as const;

function parse(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw new UsageError(describeError(error));
  }
}

export function parseCount(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new UsageError(`--${flag} must be a positive integer, got "${value}"`);
  }
  return Number(value);
}

export function parseCommand(argv: string[]): CliCommand {
  const { values, positionals } = parse(argv);
  const [command, subcommand, ...rest] = positionals;
  if (values.help || command === undefined) {
    return { kind: 'help' };
  }
  if (rest.length > 0) {
    throw new UsageError(`Unexpected argument "${rest[0]}"`);
  }

  const common: CommonOptions = {
    configPath: values.config ?? DEFAULT_CONFIG_PATH,
    json: values.json ?? false,
  };

  switch (command) {
    case 'pipeline': {
      expectNoSubcommand(command, subcommand);
      const action = values.action;
      if (action !== 'deploy' && action !== 'run') {
        throw new UsageError('pipeline needs --action deploy or --action run');
      }
      return {
        ...common,
        kind: 'pipeline',
        action,
        wait: values.wait ?? false,
        parameters: {
          clusterCount: parseCount(values['n-clusters'], 'n-clusters'),
          componentCount: parseCount(values['n-components'], 'n-components'),
          dataFile: values['data-file'],
          trainingInstanceType: values['training-instance-type'],
          inferenceInstanceType: values['inference-instance-type'],
        },
      };
    }
    case 'endpoint': {
      expectSubcommand(command, subcommand, ['deploy']);
      if (values['training-job-id'] === undefined && values['artifact-uri'] === undefined) {
        throw new UsageError('endpoint deploy needs --training-job-id or --artifact-uri');
      }
      return {
        ...common,
        kind: 'endpoint-deploy',
        endpointName: values['endpoint-name'],
        trainingJobId: values['training-job-id'],
        artifactUri: values['artifact-uri'],
        modelName: values['model-name'],
        instanceType: values['instance-type'],
        instanceCount: parseCount(values['instance-count'], 'instance-count'),
      };
    }
    case 'genai': {
      expectSubcommand(command, subcommand, ['deploy']);
      return { ...common, kind: 'genai-deploy', updateIfExists: values['update-if-exists'] };
    }
    case 'smoke': {
      const target = expectSubcommand(command, subcommand, ['endpoint', 'function']);
      return {
        ...common,
        kind: 'smoke',
        target,
        endpointName: values['endpoint-name'],
        functionName: values['function-name'],
        text: values.text,
      };
    }
    case 'deliver': {
      expectNoSubcommand(command, subcommand);
      return { ...common, kind: 'deliver', skipSmokeTests: values['skip-smoke-tests'] ?? false };
    }
    default:
      throw new UsageError(`Unknown command "${command}"`);
  }
}

function expectSubcommand<T extends string>(command: string, subcommand: string | undefined, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === subcommand);
  if (match === undefined) {
    throw new UsageError(`${command} needs one of: ${allowed.join(', ')}`);
  }
  return match;
}

function expectNoSubcommand(command: string, subcommand: string | undefined): void {
  if (subcommand !== undefined) {
    throw new UsageError(`Unexpected argument "${subcommand}" for ${command}`);
  }
}
