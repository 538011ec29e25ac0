import * as cdk from 'aws-cdk-lib';
import * as iam from 'aws-cdk-lib/aws-iam';
import { Construct } from 'constructs';

export interface KarpenterControllerPolicyProps {
  /**
   * Literal cluster name. It ends up inside IAM condition keys, which
   * cannot hold unresolved tokens.
   */
  clusterName: string;

  /** ARN of the interruption queue the controller polls */
  interruptionQueueArn: string;

  /** ARN of the role Karpenter passes to the nodes it launches */
  nodeRoleArn: string;
}

/**
 * Scoped IAM policy for the Karpenter v1 controller. Mutating EC2 and
 * instance profile calls are limited to resources tagged as owned by this
 * cluster.
 */
export class KarpenterControllerPolicy extends Construct {
  public readonly managedPolicy: iam.ManagedPolicy;

  constructor(scope: Construct, id: string, props: KarpenterControllerPolicyProps) {
    super(scope, id);

    const { clusterName } = props;
    const ec2Arn = (resource: string, account = '*') =>
      `arn:${cdk.Aws.PARTITION}:ec2:${cdk.Aws.REGION}:${account}:${resource}`;
    const instanceProfileArn = `arn:${cdk.Aws.PARTITION}:iam::${cdk.Aws.ACCOUNT_ID}:instance-profile/*`;
    const ownedResourceTag = `aws:ResourceTag/kubernetes.io/cluster/${clusterName}`;
    const ownedRequestTag = `aws:RequestTag/kubernetes.io/cluster/${clusterName}`;
    const launchedResources = [
      'fleet/*',
      'instance/*',
      'volume/*',
      'network-interface/*',
      'launch-template/*',
      'spot-instances-request/*',
    ].map((resource) => ec2Arn(resource));
    const taggedOnRequest = {
      [ownedRequestTag]: 'owned',
      'aws:RequestTag/eks:eks-cluster-name': clusterName,
    };

    this.managedPolicy = new iam.ManagedPolicy(this, 'Policy', {
      managedPolicyName: `KarpenterControllerPolicy-${clusterName}`,
      description: `IAM policy for Karpenter controller in cluster ${clusterName}`,
      statements: [
        new iam.PolicyStatement({
          sid: 'AllowScopedEC2InstanceAccessActions',
          resources: [
            ec2Arn('image/*', ''),
            ec2Arn('snapshot/*', ''),
            ec2Arn('security-group/*'),
            ec2Arn('subnet/*'),
            ec2Arn('capacity-reservation/*'),
          ],
          actions: ['ec2:RunInstances', 'ec2:CreateFleet'],
        }),
        new iam.PolicyStatement({
          sid: 'AllowScopedEC2LaunchTemplateAccessActions',
          resources: [ec2Arn('launch-template/*')],
          actions: ['ec2:RunInstances', 'ec2:CreateFleet'],
          conditions: {
            StringEquals: { [ownedResourceTag]: 'owned' },
            StringLike: { 'aws:ResourceTag/karpenter.sh/nodepool': '*' },
          },
        }),
        new iam.PolicyStatement({
          sid: 'AllowScopedEC2InstanceActionsWithTags',
          resources: launchedResources,
          actions: ['ec2:RunInstances', 'ec2:CreateFleet', 'ec2:CreateLaunchTemplate'],
          conditions: {
            StringEquals: taggedOnRequest,
            StringLike: { 'aws:RequestTag/karpenter.sh/nodepool': '*' },
          },
        }),
        new iam.PolicyStatement({
          sid: 'AllowScopedResourceCreationTagging',
          resources: launchedResources,
          actions: ['ec2:CreateTags'],
          conditions: {
            StringEquals: {
              ...taggedOnRequest,
              'ec2:CreateAction': ['RunInstances', 'CreateFleet', 'CreateLaunchTemplate'],
            },
            StringLike: { 'aws:RequestTag/karpenter.sh/nodepool': '*' },
          },
        }),
        new iam.PolicyStatement({
          sid: 'AllowScopedResourceTagging',
          resources: [ec2Arn('instance/*')],
          actions: ['ec2:CreateTags'],
          conditions: {
            StringEquals: { [ownedResourceTag]: 'owned' },
            StringLike: { 'aws:ResourceTag/karpenter.sh/nodepool': '*' },
            StringEqualsIfExists: { 'aws:RequestTag/eks:eks-cluster-name': clusterName },
            'ForAllValues:StringEquals': {
              'aws:TagKeys': ['eks:eks-cluster-name', 'karpenter.sh/nodeclaim', 'Name'],
            },
          },
        }),
        new iam.PolicyStatement({
          sid: 'AllowScopedDeletion',
          resources: [ec2Arn('instance/*'), ec2Arn('launch-template/*')],
          actions: ['ec2:TerminateInstances', 'ec2:DeleteLaunchTemplate'],
          conditions: {
            StringEquals: { [ownedResourceTag]: 'owned' },
            StringLike: { 'aws:ResourceTag/karpenter.sh/nodepool': '*' },
          },
        }),
        new iam.PolicyStatement({
          sid: 'AllowRegionalReadActions',
          resources: ['*'],
          actions: [
            'ec2:DescribeCapacityReservations',
            'ec2:DescribeImages',
            'ec2:DescribeInstances',
            'ec2:DescribeInstanceTypeOfferings',
            'ec2:DescribeInstanceTypes',
            'ec2:DescribeLaunchTemplates',
            'ec2:DescribeSecurityGroups',
            'ec2:DescribeSpotPriceHistory',
            'ec2:DescribeSubnets',
          ],
          conditions: {
            StringEquals: { 'aws:RequestedRegion': cdk.Aws.REGION },
          },
        }),
        new iam.PolicyStatement({
          sid: 'AllowSSMReadActions',
          resources: [`arn:${cdk.Aws.PARTITION}:ssm:${cdk.Aws.REGION}::parameter/aws/service/*`],
          actions: ['ssm:GetParameter'],
        }),
        new iam.PolicyStatement({
          sid: 'AllowPricingReadActions',
          resources: ['*'],
          actions: ['pricing:GetProducts'],
        }),
        new iam.PolicyStatement({
          sid: 'AllowInterruptionQueueActions',
          resources: [props.interruptionQueueArn],
          actions: ['sqs:DeleteMessage', 'sqs:GetQueueAttributes', 'sqs:GetQueueUrl', 'sqs:ReceiveMessage'],
        }),
        new iam.PolicyStatement({
          sid: 'AllowPassingInstanceRole',
          resources: [props.nodeRoleArn],
          actions: ['iam:PassRole'],
          conditions: {
            StringEquals: { 'iam:PassedToService': ['ec2.amazonaws.com', 'ec2.amazonaws.com.cn'] },
          },
        }),
        new iam.PolicyStatement({
          sid: 'AllowScopedInstanceProfileCreationActions',
          resources: [instanceProfileArn],
          actions: ['iam:CreateInstanceProfile'],
          conditions: {
            StringEquals: {
              ...taggedOnRequest,
              'aws:RequestTag/topology.kubernetes.io/region': cdk.Aws.REGION,
            },
            StringLike: { 'aws:RequestTag/karpenter.k8s.aws/ec2nodeclass': '*' },
          },
        }),
        new iam.PolicyStatement({
          sid: 'AllowScopedInstanceProfileTagActions',
          resources: [instanceProfileArn],
          actions: ['iam:TagInstanceProfile'],
          conditions: {
            StringEquals: {
              [ownedResourceTag]: 'owned',
              'aws:ResourceTag/topology.kubernetes.io/region': cdk.Aws.REGION,
              ...taggedOnRequest,
              'aws:RequestTag/topology.kubernetes.io/region': cdk.Aws.REGION,
            },
            StringLike: {
              'aws:ResourceTag/karpenter.k8s.aws/ec2nodeclass': '*',
              'aws:RequestTag/karpenter.k8s.aws/ec2nodeclass': '*',
            },
          },
        }),
        new iam.PolicyStatement({
          sid: 'AllowScopedInstanceProfileActions',
          resources: [instanceProfileArn],
          actions: [
            'iam:AddRoleToInstanceProfile',
            'iam:RemoveRoleFromInstanceProfile',
            'iam:DeleteInstanceProfile',
          ],
          conditions: {
            StringEquals: {
              [ownedResourceTag]: 'owned',
              'aws:ResourceTag/topology.kubernetes.io/region': cdk.Aws.REGION,
            },
            StringLike: { 'aws:ResourceTag/karpenter.k8s.aws/ec2nodeclass': '*' },
          },
        }),
        new iam.PolicyStatement({
          sid: 'AllowInstanceProfileReadActions',
          resources: [instanceProfileArn],
          actions: ['iam:GetInstanceProfile'],
        }),
        new iam.PolicyStatement({
          sid: 'AllowAPIServerEndpointDiscovery',
          resources: [
            `arn:${cdk.Aws.PARTITION}:eks:${cdk.Aws.REGION}:${cdk.Aws.ACCOUNT_ID}:cluster/${clusterName}`,
          ],
          actions: ['eks:DescribeCluster'],
        }),
      ],
    });
  }
}
