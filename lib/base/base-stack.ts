import * as cdk from 'aws-cdk-lib';
import * as ssm from 'aws-cdk-lib/aws-ssm';
import { Construct } from 'constructs';
import { AppConfig } from '../utils/config-loader';

export interface StackCommonProps extends cdk.StackProps {
  readonly projectPrefix: string;
  readonly appConfig: AppConfig;
}

export interface StackConfig {
  readonly Name: string;
}

/**
 * Common parent of the project's stacks. The stack is named after its config
 * section; values published with `putParameter` land in SSM under
 * `/<projectPrefix>/<key>` for the CLI and other tooling to look up.
 */
export class BaseStack extends cdk.Stack {
  protected readonly projectPrefix: string;

  constructor(scope: Construct, props: StackCommonProps, stackConfig: StackConfig) {
    super(scope, stackConfig.Name, props);

    this.projectPrefix = props.projectPrefix;

    cdk.Tags.of(this).add('Project', props.projectPrefix);
  }

  protected parameterName(key: string): string {
    return `/${this.projectPrefix}/${key}`;
  }

  protected putParameter(key: string, value: string): ssm.StringParameter {
    return new ssm.StringParameter(this, `${key}Parameter`, {
      parameterName: this.parameterName(key),
      stringValue: value,
    });
  }
}
