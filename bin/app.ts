#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { SegmentationBaseInfraStack } from './stack/base/segmentation-base-infra-stack';
import { EndpointDeploymentStack } from './stack/deployment/endpoint-deployment-stack';
import { StackCommonProps } from '../lib/base/base-stack';
import { loadConfig, projectPrefix } from '../lib/utils/config-loader';
import { describeError } from '../lib/endpoint-lifecycle/errors';
import { logger } from '../lib/utils/logger';

async function main(): Promise<void> {
  const app = new cdk.App();
  const configContext: unknown = app.node.tryGetContext('config');
  const configPath = typeof configContext === 'string' ? configContext : 'config/app-config.json';
  const appConfig = await loadConfig(configPath);

  const props: StackCommonProps = {
    projectPrefix: projectPrefix(appConfig.Project),
    appConfig,
    env: {
      account: appConfig.Project.Account,
      region: appConfig.Project.Region,
    },
  };

  const baseInfra = new SegmentationBaseInfraStack(app, props, appConfig.Stack.BaseInfra);
  const deployment = new EndpointDeploymentStack(app, props, appConfig.Stack.EndpointDeployment);
  deployment.addDependency(baseInfra);

  app.synth();
}

main().catch((error: unknown) => {
  logger.error('cdk app failed', { error: describeError(error) });
  process.exitCode = 1;
});
