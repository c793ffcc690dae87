// lib/cli/commands.ts
import { describeError } from '../endpoint-lifecycle/errors';
import { TransitionStatus } from '../endpoint-lifecycle/types';
import { smokeTestEndpoint } from '../smoke/endpoint-smoke-test';
import { smokeTestFunction } from '../smoke/function-smoke-test';
import { AppConfig, loadConfig } from '../utils/config-loader';
import { logger } from '../utils/logger';
import { runDeliveryWorkflow } from '../workflow/delivery-workflow';
import { CliCommand, HELP, UsageError, parseCommand } from './args';
import { CliServices, createAwsServices, functionSpecFromConfig } from './services';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDeps {
  readonly io?: CliIo;
  readonly loadConfig?: (path: string) => Promise<AppConfig>;
  readonly services?: (config: AppConfig) => CliServices;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

type RunnableCommand = Exclude<CliCommand, { kind: 'help' }>;

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIo;

  let command: CliCommand;
  try {
    command = parseCommand(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.err(`Error: ${error.message}`);
    io.err(HELP);
    return EXIT_USAGE;
  }
  if (command.kind === 'help') {
    io.out(HELP);
    return EXIT_OK;
  }

  try {
    const config = await (deps.loadConfig ?? loadConfig)(command.configPath);
    const services = (deps.services ?? createAwsServices)(config);
    return await execute(command, config, services, io);
  } catch (error) {
    logger.error('command failed', { command: command.kind, error: describeError(error) });
    io.err(`Error: ${describeError(error)}`);
    return EXIT_FAILURE;
  }
}

function print(io: CliIo, json: boolean, value: unknown, lines: string[]): void {
  if (json) {
    io.out(JSON.stringify(value, null, 2));
  } else {
    lines.forEach((line) => io.out(line));
  }
}

async function execute(command: RunnableCommand, config: AppConfig, services: CliServices, io: CliIo): Promise<number> {
  switch (command.kind) {
    case 'pipeline': {
      const runner = services.pipelineRunner();
      if (command.action === 'deploy') {
        const deployment = await runner.deploy();
        print(io, command.json, deployment, [`Pipeline ${deployment.action.toLowerCase()}: ${deployment.pipelineArn}`]);
        return EXIT_OK;
      }

      const execution = await runner.run(command.parameters);
      if (!command.wait) {
        print(io, command.json, execution, [`Execution ARN: ${execution.executionArn}`]);
        return EXIT_OK;
      }
      if (!command.json) io.out(`Execution ARN: ${execution.executionArn}`);
      const completion = await runner.waitForCompletion(execution.executionArn);
      const reason = completion.failureReason ? ` (${completion.failureReason})` : '';
      print(io, command.json, { ...execution, ...completion }, [`Execution status: ${completion.status}${reason}`]);
      return completion.status === 'Succeeded' ? EXIT_OK : EXIT_FAILURE;
    }

    case 'endpoint-deploy': {
      const endpoint = config.Endpoint;
      const result = await services.orchestrator().deployWithRetry({
        endpointName: command.endpointName ?? endpoint.Name,
        trainingJobId: command.trainingJobId,
        artifactUri: command.artifactUri,
        modelName: command.modelName,
        instanceType: command.instanceType ?? endpoint.InstanceType,
        instanceCount: command.instanceCount ?? endpoint.InstanceCount,
      });
      const lines = [
        `Endpoint ${result.endpointName}: ${result.action} ${result.status} `
          + `(state ${result.finalState}, config ${result.configId ?? 'none'})`,
      ];
      if (result.error) lines.push(`${result.error.code}: ${result.error.message}`);
      print(io, command.json, result, lines);
      return result.status === TransitionStatus.FAILED || result.status === TransitionStatus.CONFLICT
        ? EXIT_FAILURE
        : EXIT_OK;
    }

    case 'genai-deploy': {
      const deployment = await services.functionDeployer().deploy({
        spec: functionSpecFromConfig(config),
        packagePath: config.GenAi.PackagePath,
        updateIfExists: command.updateIfExists ?? config.GenAi.UpdateIfExists,
      });
      print(io, command.json, deployment, [deployment.message]);
      return EXIT_OK;
    }

    case 'smoke': {
      const result = command.target === 'endpoint'
        ? await smokeTestEndpoint(services.endpointInvoker(), command.endpointName ?? config.Endpoint.Name)
        : await smokeTestFunction(services.functionInvoker(), command.functionName ?? config.GenAi.FunctionName, command.text);
      print(io, command.json, result, [`${result.passed ? 'PASS' : 'FAIL'} ${result.target}: ${result.detail}`]);
      return result.passed ? EXIT_OK : EXIT_FAILURE;
    }

    case 'deliver': {
      const report = await runDeliveryWorkflow({
        pipeline: services.pipelineRunner(),
        functionDeployer: services.functionDeployer(),
        functionRequest: {
          spec: functionSpecFromConfig(config),
          packagePath: config.GenAi.PackagePath,
          updateIfExists: config.GenAi.UpdateIfExists,
        },
        endpointInvoker: services.endpointInvoker(),
        functionInvoker: services.functionInvoker(),
        endpointName: config.Endpoint.Name,
        skipSmokeTests: command.skipSmokeTests,
      });
      print(io, command.json, report, report.stages.map(
        (stage) => `${stage.status === 'succeeded' ? 'OK  ' : 'FAIL'} ${stage.stage}: ${stage.detail}`,
      ));
      return report.succeeded ? EXIT_OK : EXIT_FAILURE;
    }
  }
}
