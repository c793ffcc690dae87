// lib/genai/function-deployer.ts
import * as fs from 'fs';
import {
  CreateFunctionCommand,
  GetFunctionCommand,
  LambdaClient,
  ResourceNotFoundException,
  Runtime,
  UpdateFunctionCodeCommand,
  UpdateFunctionConfigurationCommand,
  waitUntilFunctionActiveV2,
  waitUntilFunctionUpdatedV2,
} from '@aws-sdk/client-lambda';
import { Logger, logger as rootLogger } from '../utils/logger';

export interface FunctionSpec {
  readonly functionName: string;
  readonly roleArn: string;
  readonly runtime: string;
  readonly handler: string;
  readonly timeoutSeconds: number;
  readonly memorySize: number;
  readonly environment: Record<string, string>;
  readonly description?: string;
}

/** Lambda operations the deployer needs. */
export interface FunctionGateway {
  exists(functionName: string): Promise<boolean>;
  create(spec: FunctionSpec, zip: Uint8Array): Promise<string>;
  updateCode(functionName: string, zip: Uint8Array): Promise<string>;
  updateConfiguration(spec: FunctionSpec): Promise<void>;
  waitUntilUpdated(functionName: string): Promise<void>;
  waitUntilActive(functionName: string): Promise<void>;
}

export type FunctionDeploymentAction = 'CREATE' | 'UPDATE' | 'NO_OP';

export interface FunctionDeploymentRequest {
  readonly spec: FunctionSpec;
  readonly packagePath: string;
  readonly updateIfExists: boolean;
}

export interface FunctionDeployment {
  readonly functionName: string;
  readonly action: FunctionDeploymentAction;
  readonly functionArn?: string;
  readonly message: string;
}

const WAIT_SECONDS = 300;

export class LambdaFunctionGateway implements FunctionGateway {
  constructor(private readonly client: LambdaClient = new LambdaClient({})) {}

  public async exists(functionName: string): Promise<boolean> {
    try {
      await this.client.send(new GetFunctionCommand({ FunctionName: functionName }));
      return true;
    } catch (error) {
      if (error instanceof ResourceNotFoundException) return false;
      throw error;
    }
  }

  public async create(spec: FunctionSpec, zip: Uint8Array): Promise<string> {
    const response = await this.client.send(new CreateFunctionCommand({
      FunctionName: spec.functionName,
      Role: spec.roleArn,
      Runtime: toRuntime(spec.runtime),
      Handler: spec.handler,
      Code: { ZipFile: zip },
      Description: spec.description,
      Timeout: spec.timeoutSeconds,
      MemorySize: spec.memorySize,
      Publish: true,
      Environment: { Variables: spec.environment },
    }));
    return response.FunctionArn ?? spec.functionName;
  }

  public async updateCode(functionName: string, zip: Uint8Array): Promise<string> {
    const response = await this.client.send(new UpdateFunctionCodeCommand({
      FunctionName: functionName,
      ZipFile: zip,
      Publish: true,
    }));
    return response.FunctionArn ?? functionName;
  }

  public async updateConfiguration(spec: FunctionSpec): Promise<void> {
    await this.client.send(new UpdateFunctionConfigurationCommand({
      FunctionName: spec.functionName,
      Environment: { Variables: spec.environment },
      MemorySize: spec.memorySize,
      Timeout: spec.timeoutSeconds,
    }));
  }

  public async waitUntilUpdated(functionName: string): Promise<void> {
    await waitUntilFunctionUpdatedV2({ client: this.client, maxWaitTime: WAIT_SECONDS }, { FunctionName: functionName });
  }

  public async waitUntilActive(functionName: string): Promise<void> {
    await waitUntilFunctionActiveV2({ client: this.client, maxWaitTime: WAIT_SECONDS }, { FunctionName: functionName });
  }
}

export interface FunctionDeployerProps {
  readonly gateway: FunctionGateway;
  readonly readPackage?: (path: string) => Uint8Array;
  readonly logger?: Logger;
}

export class FunctionDeployer {
  private readonly readPackage: (path: string) => Uint8Array;
  private readonly logger: Logger;

  constructor(private readonly props: FunctionDeployerProps) {
    this.readPackage = props.readPackage ?? ((path) => fs.readFileSync(path));
    this.logger = (props.logger ?? rootLogger).child({ component: 'function-deployer' });
  }

  /**
   * Creates the function, or updates code then configuration when it exists
   * and `updateIfExists` is set. An existing function is otherwise left alone.
   */
  public async deploy(request: FunctionDeploymentRequest): Promise<FunctionDeployment> {
    const { spec, updateIfExists } = request;
    const { gateway } = this.props;
    const functionName = spec.functionName;

    const exists = await gateway.exists(functionName);
    if (exists && !updateIfExists) {
      const message = `Function ${functionName} exists; pass updateIfExists to update it`;
      this.logger.info(message);
      return { functionName, action: 'NO_OP', message };
    }

    const zip = this.readPackage(request.packagePath);
    if (exists) {
      this.logger.info('updating function', { functionName });
      const functionArn = await gateway.updateCode(functionName, zip);
      // Configuration changes are rejected while the code update is in progress.
      await gateway.waitUntilUpdated(functionName);
      await gateway.updateConfiguration(spec);
      await gateway.waitUntilUpdated(functionName);
      return { functionName, action: 'UPDATE', functionArn, message: `Updated ${functionName}` };
    }

    this.logger.info('creating function', { functionName });
    const functionArn = await gateway.create(spec, zip);
    await gateway.waitUntilActive(functionName);
    return { functionName, action: 'CREATE', functionArn, message: `Created ${functionName}` };
  }
}

function toRuntime(value: string): Runtime {
  const known: readonly string[] = Object.values(Runtime);
  if (!isRuntime(value, known)) {
    throw new Error(`${value} is not a Lambda runtime`);
  }
  return value;
}

function isRuntime(value: string, known: readonly string[]): value is Runtime {
  return known.includes(value);
}
