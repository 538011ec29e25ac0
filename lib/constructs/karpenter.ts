import * as cdk from 'aws-cdk-lib';
import * as eks from 'aws-cdk-lib/aws-eks';
import * as events from 'aws-cdk-lib/aws-events';
import * as targets from 'aws-cdk-lib/aws-events-targets';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as sqs from 'aws-cdk-lib/aws-sqs';
import { Construct } from 'constructs';
import { KarpenterConfig } from '../config/config';
import { HelmDeployWithPodIdentity } from './helm-deploy-with-pod-identity';
import { KarpenterControllerPolicy } from './karpenter-controller-policy';
import { adminNodeAffinity, adminTolerations } from './scheduling';

export const KARPENTER_NAMESPACE = 'karpenter';
export const KARPENTER_SERVICE_ACCOUNT = 'karpenter';
export const KARPENTER_CHART_REPOSITORY = 'oci://public.ecr.aws/karpenter/karpenter';

export type KarpenterSpec = Record<string, unknown>;

export interface KarpenterProps {
  cluster: eks.Cluster;
  /** Literal cluster name, used in tag keys and IAM condition keys */
  clusterName: string;
  config: KarpenterConfig;
}

/**
 * Installs Karpenter with its interruption queue, node role and scoped
 * controller policy, and creates the default EC2NodeClass and NodePool.
 */
export class Karpenter extends Construct {
  public readonly nodeRole: iam.Role;
  public readonly interruptionQueue: sqs.Queue;
  public readonly controllerPolicy: KarpenterControllerPolicy;
  public readonly helmDeploy: HelmDeployWithPodIdentity;
  public readonly defaultNodeClass: eks.KubernetesManifest;
  public readonly defaultNodePool: eks.KubernetesManifest;

  private readonly cluster: eks.Cluster;

  constructor(scope: Construct, id: string, props: KarpenterProps) {
    super(scope, id);

    const { cluster, clusterName, config } = props;
    this.cluster = cluster;

    // Create Karpenter node IAM role
    this.nodeRole = new iam.Role(this, 'KarpenterNodeRole', {
      roleName: `KarpenterNodeRole-${clusterName}`,
      assumedBy: new iam.ServicePrincipal('ec2.amazonaws.com'),
      managedPolicies: [
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonEKSWorkerNodePolicy'),
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonEKS_CNI_Policy'),
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonEC2ContainerRegistryReadOnly'),
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonSSMManagedInstanceCore'),
      ],
    });

    // Nodes launched by Karpenter join the cluster through aws-auth
    cluster.awsAuth.addRoleMapping(this.nodeRole, {
      username: 'system:node:{{EC2PrivateDNSName}}',
      groups: ['system:bootstrappers', 'system:nodes'],
    });

    // Create SQS queue for interruption handling
    this.interruptionQueue = this.addInterruptionQueue(clusterName);

    // Create Karpenter controller policy
    this.controllerPolicy = new KarpenterControllerPolicy(this, 'KarpenterControllerPolicy', {
      clusterName,
      interruptionQueueArn: this.interruptionQueue.queueArn,
      nodeRoleArn: this.nodeRole.roleArn,
    });

    // Install the controller, authenticated through Pod Identity
    this.helmDeploy = new HelmDeployWithPodIdentity(this, 'EksKarpenterHelmChart', {
      cluster,
      chart: 'karpenter',
      release: 'karpenter',
      repository: KARPENTER_CHART_REPOSITORY,
      namespace: KARPENTER_NAMESPACE,
      version: config.chartVersion,
      serviceAccountName: KARPENTER_SERVICE_ACCOUNT,
      values: {
        replicas: 1,
        settings: {
          clusterName: cluster.clusterName,
          clusterEndpoint: cluster.clusterEndpoint,
          interruptionQueue: this.interruptionQueue.queueName,
        },
        controller: {
          resources: {
            limits: {
              cpu: '200m',
              memory: '256Mi',
            },
            requests: {
              cpu: '50m',
              memory: '64Mi',
            },
          },
        },
        affinity: adminNodeAffinity(),
        tolerations: adminTolerations(),
      },
    });
    this.helmDeploy.role.addManagedPolicy(this.controllerPolicy.managedPolicy);

    // Create default EC2NodeClass
    this.defaultNodeClass = this.addEc2NodeClass('default', {
      role: this.nodeRole.roleName,
      amiSelectorTerms: [{ alias: config.amiAlias }],
      subnetSelectorTerms: [{ tags: { 'karpenter.sh/discovery': clusterName } }],
      securityGroupSelectorTerms: [{ id: cluster.clusterSecurityGroupId }],
      blockDeviceMappings: [
        {
          deviceName: '/dev/xvda',
          ebs: {
            volumeSize: '50Gi',
            volumeType: 'gp3',
            deleteOnTermination: true,
            encrypted: true,
          },
        },
      ],
      tags: {
        'karpenter.sh/discovery': clusterName,
      },
    });

    // Create default NodePool
    this.defaultNodePool = this.addNodePool('default', {
      template: {
        metadata: {
          labels: {
            'node-type': 'karpenter',
          },
        },
        spec: {
          requirements: [
            { key: 'kubernetes.io/os', operator: 'In', values: ['linux'] },
            { key: 'kubernetes.io/arch', operator: 'In', values: ['amd64', 'arm64'] },
            { key: 'karpenter.sh/capacity-type', operator: 'In', values: config.capacityTypes },
            { key: 'karpenter.k8s.aws/instance-category', operator: 'In', values: config.instanceCategories },
          ],
          nodeClassRef: {
            group: 'karpenter.k8s.aws',
            kind: 'EC2NodeClass',
            name: 'default',
          },
          expireAfter: '720h',
        },
      },
      disruption: {
        consolidationPolicy: 'WhenEmptyOrUnderutilized',
        consolidateAfter: '1m',
      },
      limits: {
        cpu: String(config.cpuLimit),
      },
    });
    this.defaultNodePool.node.addDependency(this.defaultNodeClass);

    // Output important values
    new cdk.CfnOutput(this, 'KarpenterNodeRoleArn', {
      value: this.nodeRole.roleArn,
      description: 'Karpenter Node IAM Role ARN',
    });

    new cdk.CfnOutput(this, 'KarpenterQueueName', {
      value: this.interruptionQueue.queueName,
      description: 'Karpenter SQS Queue Name',
    });
  }

  /** Adds a cluster-scoped `karpenter.k8s.aws/v1` EC2NodeClass. */
  public addEc2NodeClass(name: string, spec: KarpenterSpec): eks.KubernetesManifest {
    return this.addKarpenterManifest(`${name}-EC2NodeClass`, {
      apiVersion: 'karpenter.k8s.aws/v1',
      kind: 'EC2NodeClass',
      metadata: { name },
      spec,
    });
  }

  /** Adds a cluster-scoped `karpenter.sh/v1` NodePool. */
  public addNodePool(name: string, spec: KarpenterSpec): eks.KubernetesManifest {
    return this.addKarpenterManifest(`${name}-NodePool`, {
      apiVersion: 'karpenter.sh/v1',
      kind: 'NodePool',
      metadata: { name },
      spec,
    });
  }

  // The CRDs come with the chart, so every custom resource waits for it
  private addKarpenterManifest(id: string, manifest: Record<string, unknown>): eks.KubernetesManifest {
    const resource = this.cluster.addManifest(id, manifest);
    resource.node.addDependency(this.helmDeploy.chart);
    return resource;
  }

  private addInterruptionQueue(clusterName: string): sqs.Queue {
    const queue = new sqs.Queue(this, 'KarpenterInterruptionQueue', {
      queueName: clusterName,
      retentionPeriod: cdk.Duration.minutes(5),
      enforceSSL: true,
    });

    const patterns: Record<string, events.EventPattern> = {
      ScheduledChangeRule: { source: ['aws.health'], detailType: ['AWS Health Event'] },
      SpotInterruptionRule: { source: ['aws.ec2'], detailType: ['EC2 Spot Instance Interruption Warning'] },
      RebalanceRule: { source: ['aws.ec2'], detailType: ['EC2 Instance Rebalance Recommendation'] },
      InstanceStateChangeRule: { source: ['aws.ec2'], detailType: ['EC2 Instance State-change Notification'] },
    };

    // Route every event to the queue
    Object.entries(patterns).forEach(([ruleId, eventPattern]) => {
      const rule = new events.Rule(this, ruleId, { eventPattern });
      rule.addTarget(new targets.SqsQueue(queue));
    });

    return queue;
  }
}
