import * as cdk from 'aws-cdk-lib';
import * as eks from 'aws-cdk-lib/aws-eks';
import * as ssm from 'aws-cdk-lib/aws-ssm';
import { Construct } from 'constructs';

export interface EksSsmParametersStackProps extends cdk.StackProps {
  cluster: eks.Cluster;
}

/**
 * Publishes cluster coordinates under `/eks/` so other stacks and
 * pipelines can find the cluster without cross-stack exports.
 */
export class EksSsmParametersStack extends cdk.Stack {
  public readonly parameters: Record<string, ssm.StringParameter> = {};

  constructor(scope: Construct, id: string, props: EksSsmParametersStackProps) {
    super(scope, id, props);

    const { cluster } = props;

    const values: [string, string, string | undefined][] = [
      ['EksClusterNameParam', '/eks/clusterName', cluster.clusterName],
      ['EksClusterArnParam', '/eks/clusterArn', cluster.clusterArn],
      ['EksClusterEndpointParam', '/eks/clusterEndpoint', cluster.clusterEndpoint],
      ['EksClusterSecurityGroupsParam', '/eks/clusterSecurityGroup', cluster.clusterSecurityGroupId],
      ['EksClusterOIDCProviderArn', '/eks/oidc/provider_arn', cluster.openIdConnectProvider.openIdConnectProviderArn],
      ['EksClusterKubectlLambdaRoleArn', '/eks/kubectl/lambda/role_arn', cluster.kubectlLambdaRole?.roleArn],
      ['EksClusterKubectlRoleArn', '/eks/kubectl/role_arn', cluster.kubectlRole?.roleArn],
      ['EksClusterKubectlSgId', '/eks/kubectl/sg_id', cluster.kubectlSecurityGroup?.securityGroupId],
    ];

    for (const [parameterId, parameterName, stringValue] of values) {
      // kubectl handler details only exist for some cluster configurations
      if (stringValue === undefined) {
        continue;
      }
      this.parameters[parameterName] = new ssm.StringParameter(this, parameterId, { parameterName, stringValue });
    }
  }
}
