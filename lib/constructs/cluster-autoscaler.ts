import * as cdk from 'aws-cdk-lib';
import * as eks from 'aws-cdk-lib/aws-eks';
import * as iam from 'aws-cdk-lib/aws-iam';
import { Construct } from 'constructs';
import { createPodIdentityRole } from './helm-deploy-with-pod-identity';
import { adminNodeAffinity, adminTolerations } from './scheduling';

export interface ClusterAutoscalerProps {
  cluster: eks.ICluster;
}

/**
 * Kubernetes Cluster Autoscaler for the managed node groups. Alternative to
 * Karpenter; only one of the two should be scaling a given node group.
 */
export class ClusterAutoscaler extends Construct {
  public static readonly SERVICE_ACCOUNT = 'cluster-autoscaler';
  public static readonly NAMESPACE = 'kube-system';

  public readonly role: iam.Role;
  public readonly chart: eks.HelmChart;

  constructor(scope: Construct, id: string, props: ClusterAutoscalerProps) {
    super(scope, id);

    const { region, account } = cdk.Stack.of(this);
    const { cluster } = props;

    this.role = createPodIdentityRole(this, 'EksAwsClusterAutoscalerRole', 'EksAwsClusterAutoscalerRole');
    [
      new iam.PolicyStatement({
        actions: [
          'autoscaling:DescribeAutoScalingGroups',
          'autoscaling:DescribeAutoScalingInstances',
          'autoscaling:DescribeLaunchConfigurations',
          'autoscaling:DescribeScalingActivities',
          'autoscaling:DescribeTags',
          'ec2:DescribeImages',
          'ec2:DescribeInstanceTypes',
          'ec2:DescribeLaunchTemplateVersions',
          'ec2:GetInstanceTypesFromInstanceRequirements',
          'eks:DescribeNodegroup',
        ],
        resources: ['*'],
      }),
      new iam.PolicyStatement({
        actions: ['autoscaling:SetDesiredCapacity', 'autoscaling:TerminateInstanceInAutoScalingGroup'],
        resources: [
          `arn:${cdk.Aws.PARTITION}:autoscaling:${region}:${account}:autoScalingGroup:*:autoScalingGroupName/*`,
        ],
      }),
    ].forEach((statement) => this.role.addToPrincipalPolicy(statement));

    const association = new eks.CfnPodIdentityAssociation(this, 'EksAutoScalerPodIdentityAssociation', {
      clusterName: cluster.clusterName,
      namespace: ClusterAutoscaler.NAMESPACE,
      roleArn: this.role.roleArn,
      serviceAccount: ClusterAutoscaler.SERVICE_ACCOUNT,
    });

    this.chart = cluster.addHelmChart('EksAwsClusterAutoscaler', {
      chart: 'cluster-autoscaler',
      repository: 'https://kubernetes.github.io/autoscaler',
      release: 'cluster-autoscaler',
      namespace: ClusterAutoscaler.NAMESPACE,
      values: {
        autoDiscovery: {
          clusterName: cluster.clusterName,
        },
        awsRegion: region,
        rbac: {
          serviceAccount: {
            create: true,
            name: ClusterAutoscaler.SERVICE_ACCOUNT,
          },
        },
        replicaCount: 1,
        resources: {
          limits: {
            cpu: '200m',
            memory: '128Mi',
          },
          requests: {
            cpu: '100m',
            memory: '128Mi',
          },
        },
        extraArgs: {
          'scale-down-utilization-threshold': 0.6,
          'scale-down-non-empty-candidates-count': 30,
          'scale-down-delay-after-add': '3m',
          'scale-down-delay-after-delete': '0s',
          'scale-down-unneeded-time': '7m',
          'skip-nodes-with-local-storage': false,
          'skip-nodes-with-system-pods': true,
          'balance-similar-node-groups': true,
          expander: 'least-waste',
        },
        affinity: adminNodeAffinity(),
        tolerations: adminTolerations(),
      },
    });
    this.chart.node.addDependency(association);
  }
}
