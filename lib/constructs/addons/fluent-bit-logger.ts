import * as cdk from 'aws-cdk-lib';
import * as eks from 'aws-cdk-lib/aws-eks';
import * as iam from 'aws-cdk-lib/aws-iam';
import { Construct } from 'constructs';
import { HelmDeployWithPodIdentity } from '../helm-deploy-with-pod-identity';
import { adminNodeAffinity, adminTolerations } from '../scheduling';

export interface FluentBitLoggerProps {
  cluster: eks.ICluster;
  /** @default '/eks/application-log/' */
  logGroupName?: string;
}

/**
 * Ships container logs to CloudWatch Logs with aws-for-fluent-bit.
 */
export class FluentBitLogger extends Construct {
  public readonly helmDeploy: HelmDeployWithPodIdentity;

  constructor(scope: Construct, id: string, props: FluentBitLoggerProps) {
    super(scope, id);

    this.helmDeploy = new HelmDeployWithPodIdentity(this, 'EksAwsFluentBitLogger', {
      cluster: props.cluster,
      chart: 'aws-for-fluent-bit',
      release: 'aws-for-fluent-bit',
      repository: 'https://aws.github.io/eks-charts',
      namespace: 'kube-system',
      version: '0.1.34',
      serviceAccountName: 'aws-for-fluent-bit',
      rolePolicyStatements: [
        new iam.PolicyStatement({
          actions: [
            'logs:PutLogEvents',
            'logs:DescribeLogStreams',
            'logs:DescribeLogGroups',
            'logs:CreateLogStream',
            'logs:CreateLogGroup',
          ],
          resources: ['*'],
        }),
      ],
      values: {
        cloudWatch: {
          enabled: true,
          region: cdk.Stack.of(this).region,
          logGroupName: props.logGroupName ?? '/eks/application-log/',
          logStreamPrefix: 'log-',
        },
        affinity: adminNodeAffinity(),
        tolerations: adminTolerations(),
        resources: {
          limits: {
            cpu: '200m',
            memory: '256Mi',
          },
          requests: {
            cpu: '50m',
            memory: '50Mi',
          },
        },
      },
    });
  }
}
