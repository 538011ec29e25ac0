import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as eks from 'aws-cdk-lib/aws-eks';
import * as iam from 'aws-cdk-lib/aws-iam';
import { Construct } from 'constructs';
import { HelmDeployWithPodIdentity } from '../helm-deploy-with-pod-identity';
import { adminNodeAffinity, adminTolerations } from '../scheduling';

export interface AlbControllerAddonProps {
  cluster: eks.ICluster;
  vpc: ec2.IVpc;
  /** @default '1.8.2' */
  chartVersion?: string;
}

/**
 * AWS Load Balancer Controller, installed from the eks-charts repository
 * with credentials from Pod Identity.
 */
export class AlbControllerAddon extends Construct {
  public static readonly CHART = 'aws-load-balancer-controller';
  public static readonly RELEASE = 'aws-load-balancer-controller';
  public static readonly REPOSITORY = 'https://aws.github.io/eks-charts';
  public static readonly NAMESPACE = 'kube-system';
  public static readonly SERVICE_ACCOUNT = 'application-loadbalancer';

  public readonly helmDeploy: HelmDeployWithPodIdentity;

  constructor(scope: Construct, id: string, props: AlbControllerAddonProps) {
    super(scope, id);

    this.helmDeploy = new HelmDeployWithPodIdentity(this, 'EksAwsAlbControllerAddOn', {
      cluster: props.cluster,
      chart: AlbControllerAddon.CHART,
      release: AlbControllerAddon.RELEASE,
      repository: AlbControllerAddon.REPOSITORY,
      namespace: AlbControllerAddon.NAMESPACE,
      version: props.chartVersion ?? '1.8.2',
      serviceAccountName: AlbControllerAddon.SERVICE_ACCOUNT,
      rolePolicyStatements: AlbControllerAddon.policyStatements(),
      values: {
        clusterName: props.cluster.clusterName,
        region: cdk.Stack.of(this).region,
        vpcId: props.vpc.vpcId,
        affinity: adminNodeAffinity(),
        tolerations: adminTolerations(),
      },
    });
  }

  /**
   * Permissions the controller needs to manage load balancers, target
   * groups and their security groups. Returns fresh statements on each call
   * so they can be attached to more than one principal.
   */
  public static policyStatements(): iam.PolicyStatement[] {
    const partition = cdk.Aws.PARTITION;
    const clusterRequestTagPresent = { 'aws:RequestTag/elbv2.k8s.aws/cluster': 'false' };
    const targetGroupArn = `arn:${partition}:elasticloadbalancing:*:*:targetgroup/*/*`;
    const loadBalancerArns = [
      targetGroupArn,
      `arn:${partition}:elasticloadbalancing:*:*:loadbalancer/net/*/*`,
      `arn:${partition}:elasticloadbalancing:*:*:loadbalancer/app/*/*`,
    ];

    return [
      new iam.PolicyStatement({
        actions: ['iam:CreateServiceLinkedRole'],
        resources: ['*'],
        conditions: {
          StringEquals: { 'iam:AWSServiceName': 'elasticloadbalancing.amazonaws.com' },
        },
      }),
      new iam.PolicyStatement({
        actions: [
          'ec2:DescribeAccountAttributes',
          'ec2:DescribeAddresses',
          'ec2:DescribeAvailabilityZones',
          'ec2:DescribeInternetGateways',
          'ec2:DescribeVpcs',
          'ec2:DescribeVpcPeeringConnections',
          'ec2:DescribeSubnets',
          'ec2:DescribeSecurityGroups',
          'ec2:DescribeInstances',
          'ec2:DescribeNetworkInterfaces',
          'ec2:DescribeTags',
          'ec2:GetCoipPoolUsage',
          'ec2:DescribeCoipPools',
          'elasticloadbalancing:DescribeLoadBalancers',
          'elasticloadbalancing:DescribeLoadBalancerAttributes',
          'elasticloadbalancing:DescribeListeners',
          'elasticloadbalancing:DescribeListenerCertificates',
          'elasticloadbalancing:DescribeSSLPolicies',
          'elasticloadbalancing:DescribeRules',
          'elasticloadbalancing:DescribeTargetGroups',
          'elasticloadbalancing:DescribeTargetGroupAttributes',
          'elasticloadbalancing:DescribeTargetHealth',
          'elasticloadbalancing:DescribeTags',
          'elasticloadbalancing:DescribeTrustStores',
        ],
        resources: ['*'],
      }),
      new iam.PolicyStatement({
        actions: [
          'cognito-idp:DescribeUserPoolClient',
          'acm:ListCertificates',
          'acm:DescribeCertificate',
          'iam:ListServerCertificates',
          'iam:GetServerCertificate',
          'waf-regional:GetWebACL',
          'waf-regional:GetWebACLForResource',
          'waf-regional:AssociateWebACL',
          'waf-regional:DisassociateWebACL',
          'wafv2:GetWebACL',
          'wafv2:GetWebACLForResource',
          'wafv2:AssociateWebACL',
          'wafv2:DisassociateWebACL',
          'shield:GetSubscriptionState',
          'shield:DescribeProtection',
          'shield:CreateProtection',
          'shield:DeleteProtection',
        ],
        resources: ['*'],
      }),
      new iam.PolicyStatement({
        actions: ['ec2:AuthorizeSecurityGroupIngress', 'ec2:RevokeSecurityGroupIngress', 'ec2:CreateSecurityGroup'],
        resources: ['*'],
      }),
      new iam.PolicyStatement({
        actions: ['ec2:CreateTags'],
        resources: [`arn:${partition}:ec2:*:*:security-group/*`],
        conditions: {
          StringEquals: { 'ec2:CreateAction': 'CreateSecurityGroup' },
          Null: clusterRequestTagPresent,
        },
      }),
      new iam.PolicyStatement({
        actions: ['ec2:CreateTags', 'ec2:DeleteTags'],
        resources: [`arn:${partition}:ec2:*:*:security-group/*`],
        conditions: {
          Null: {
            'aws:RequestTag/elbv2.k8s.aws/cluster': 'true',
            'aws:ResourceTag/elbv2.k8s.aws/cluster': 'false',
          },
        },
      }),
      new iam.PolicyStatement({
        actions: [
          'ec2:AuthorizeSecurityGroupIngress',
          'ec2:RevokeSecurityGroupIngress',
          'ec2:DeleteSecurityGroup',
        ],
        resources: ['*'],
        conditions: {
          Null: { 'aws:ResourceTag/elbv2.k8s.aws/cluster': 'false' },
        },
      }),
      new iam.PolicyStatement({
        actions: ['elasticloadbalancing:CreateLoadBalancer', 'elasticloadbalancing:CreateTargetGroup'],
        resources: ['*'],
        conditions: { Null: clusterRequestTagPresent },
      }),
      new iam.PolicyStatement({
        actions: [
          'elasticloadbalancing:CreateListener',
          'elasticloadbalancing:DeleteListener',
          'elasticloadbalancing:CreateRule',
          'elasticloadbalancing:DeleteRule',
        ],
        resources: ['*'],
      }),
      new iam.PolicyStatement({
        actions: ['elasticloadbalancing:AddTags', 'elasticloadbalancing:RemoveTags'],
        resources: loadBalancerArns,
        conditions: {
          Null: {
            'aws:RequestTag/elbv2.k8s.aws/cluster': 'true',
            'aws:ResourceTag/elbv2.k8s.aws/cluster': 'false',
          },
        },
      }),
      new iam.PolicyStatement({
        actions: ['elasticloadbalancing:AddTags', 'elasticloadbalancing:RemoveTags'],
        resources: [
          `arn:${partition}:elasticloadbalancing:*:*:listener/net/*/*/*`,
          `arn:${partition}:elasticloadbalancing:*:*:listener/app/*/*/*`,
          `arn:${partition}:elasticloadbalancing:*:*:listener-rule/net/*/*/*`,
          `arn:${partition}:elasticloadbalancing:*:*:listener-rule/app/*/*/*`,
        ],
      }),
      new iam.PolicyStatement({
        actions: [
          'elasticloadbalancing:ModifyLoadBalancerAttributes',
          'elasticloadbalancing:SetIpAddressType',
          'elasticloadbalancing:SetSecurityGroups',
          'elasticloadbalancing:SetSubnets',
          'elasticloadbalancing:DeleteLoadBalancer',
          'elasticloadbalancing:ModifyTargetGroup',
          'elasticloadbalancing:ModifyTargetGroupAttributes',
          'elasticloadbalancing:DeleteTargetGroup',
        ],
        resources: ['*'],
        conditions: {
          Null: { 'aws:ResourceTag/elbv2.k8s.aws/cluster': 'false' },
        },
      }),
      new iam.PolicyStatement({
        actions: ['elasticloadbalancing:AddTags'],
        resources: loadBalancerArns,
        conditions: {
          StringEquals: {
            'elasticloadbalancing:CreateAction': ['CreateTargetGroup', 'CreateLoadBalancer'],
          },
          Null: clusterRequestTagPresent,
        },
      }),
      new iam.PolicyStatement({
        actions: ['elasticloadbalancing:RegisterTargets', 'elasticloadbalancing:DeregisterTargets'],
        resources: [targetGroupArn],
      }),
      new iam.PolicyStatement({
        actions: [
          'elasticloadbalancing:SetWebAcl',
          'elasticloadbalancing:ModifyListener',
          'elasticloadbalancing:AddListenerCertificates',
          'elasticloadbalancing:RemoveListenerCertificates',
          'elasticloadbalancing:ModifyRule',
        ],
        resources: ['*'],
      }),
    ];
  }
}
