import { KubectlV31Layer } from '@aws-cdk/lambda-layer-kubectl-v31';
import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as eks from 'aws-cdk-lib/aws-eks';
import * as iam from 'aws-cdk-lib/aws-iam';
import { Construct } from 'constructs';
import { AppConfig, EndpointAccessName } from './config/config';
import { AlbControllerAddon } from './constructs/addons/alb-controller-addon';
import { CoreDnsAddon } from './constructs/addons/coredns-addon';
import { EbsCsiDriverAddon } from './constructs/addons/ebs-csi-driver-addon';
import { FluentBitLogger } from './constructs/addons/fluent-bit-logger';
import { PodIdentityAddon } from './constructs/addons/pod-identity-addon';
import { BastionHost } from './constructs/bastion-host';
import { ClusterAutoscaler } from './constructs/cluster-autoscaler';
import { Karpenter } from './constructs/karpenter';
import { NodeGroups } from './constructs/node-groups';

const ENDPOINT_ACCESS: Record<EndpointAccessName, eks.EndpointAccess> = {
  private: eks.EndpointAccess.PRIVATE,
  public: eks.EndpointAccess.PUBLIC,
  'public-and-private': eks.EndpointAccess.PUBLIC_AND_PRIVATE,
};

export interface EksClusterStackProps extends cdk.StackProps {
  config: AppConfig;
  vpc: ec2.IVpc;
  kmsCrossAccountUsagePolicy: iam.IManagedPolicy;
  /** Deployment phase, e.g. `dev` */
  phase: string;
}

export class EksClusterStack extends cdk.Stack {
  public readonly cluster: eks.Cluster;
  public readonly nodeRole: iam.Role;
  public readonly coreDns: CoreDnsAddon;
  public readonly podIdentity: PodIdentityAddon;
  public readonly albController: AlbControllerAddon;
  public readonly nodeGroups: NodeGroups;
  public readonly bastion: BastionHost;
  public readonly ebsCsiDriver?: EbsCsiDriverAddon;
  public readonly fluentBit?: FluentBitLogger;
  public readonly clusterAutoscaler?: ClusterAutoscaler;
  public readonly karpenter?: Karpenter;

  constructor(scope: Construct, id: string, props: EksClusterStackProps) {
    super(scope, id, props);

    const { config, vpc } = props;
    const eksConfig = config.eks;
    const privateSubnets: ec2.SubnetSelection = { subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS };

    cdk.Tags.of(this).add('Phase', props.phase);

    // Create EKS cluster
    this.cluster = new eks.Cluster(this, eksConfig.clusterName, {
      clusterName: eksConfig.clusterName,
      version: eks.KubernetesVersion.of(eksConfig.kubernetesVersion),
      vpc,
      vpcSubnets: [privateSubnets],
      role: this.createControlPlaneRole(),
      kubectlLayer: new KubectlV31Layer(this, 'kubectl'),
      defaultCapacity: 0,
      endpointAccess: ENDPOINT_ACCESS[eksConfig.endpointAccess],
      authenticationMode: eks.AuthenticationMode.API_AND_CONFIG_MAP,
    });

    // System add-ons
    this.coreDns = new CoreDnsAddon(this, 'EksCoreDnsAddOn', { cluster: this.cluster });
    this.podIdentity = new PodIdentityAddon(this, 'EksPodIdentityAddOn', { cluster: this.cluster });

    this.albController = new AlbControllerAddon(this, 'EksAwsAlbControllerAddOn', {
      cluster: this.cluster,
      vpc,
    });

    // Must live in this stack; defining it next to the cluster avoids a
    // circular reference through the node groups
    this.nodeRole = this.createNodeRole(props.kmsCrossAccountUsagePolicy);

    // Create managed node groups
    this.nodeGroups = new NodeGroups(this, 'EksNodeGroups', {
      cluster: this.cluster,
      nodeRole: this.nodeRole,
      subnets: privateSubnets,
      nodeGroups: eksConfig.nodeGroups,
    });
    if (!this.nodeGroups.hasAdminCapacity) {
      cdk.Annotations.of(this.nodeGroups).addWarningV2(
        'eks:noAdminNodeGroup',
        'No node group is labelled purpose=admin; CoreDNS, the load balancer controller and Karpenter will stay pending',
      );
    }

    // Jump host for the private endpoint
    this.bastion = new BastionHost(this, 'EksBastionHost', {
      cluster: this.cluster,
      vpc,
      keyName: config.admin.keyName,
    });

    // Optional add-ons
    if (eksConfig.addons.ebsCsiDriver) {
      this.ebsCsiDriver = new EbsCsiDriverAddon(this, 'EksEbsCSIDriverAddOn', { cluster: this.cluster });
    }

    if (eksConfig.addons.fluentBit) {
      this.fluentBit = new FluentBitLogger(this, 'EksAwsFluentBitLogger', { cluster: this.cluster });
    }

    if (eksConfig.addons.clusterAutoscaler) {
      this.clusterAutoscaler = new ClusterAutoscaler(this, 'EksAwsClusterAutoscaler', { cluster: this.cluster });
    }

    if (eksConfig.karpenter.enabled) {
      this.karpenter = new Karpenter(this, 'EksKarpenterDeployConstruct', {
        cluster: this.cluster,
        clusterName: eksConfig.clusterName,
        config: eksConfig.karpenter,
      });
      // Add dependencies
      this.karpenter.node.addDependency(this.nodeGroups);
      this.karpenter.node.addDependency(this.albController);
      if (this.clusterAutoscaler) {
        cdk.Annotations.of(this).addWarningV2(
          'eks:twoAutoscalers',
          'Karpenter and the Cluster Autoscaler are both enabled',
        );
      }
    } else {
      cdk.Annotations.of(this).addInfo('Karpenter is disabled; node groups will not scale automatically');
    }

    // Output important values
    new cdk.CfnOutput(this, 'ClusterName', {
      value: this.cluster.clusterName,
      description: 'EKS Cluster Name',
    });

    new cdk.CfnOutput(this, 'KubectlCommand', {
      value: `aws eks update-kubeconfig --region ${this.region} --name ${eksConfig.clusterName}`,
      description: 'Command to configure kubectl',
    });
  }

  private createControlPlaneRole(): iam.Role {
    return new iam.Role(this, 'EksClusterRole', {
      assumedBy: new iam.ServicePrincipal('eks.amazonaws.com'),
      managedPolicies: [
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonEKSClusterPolicy'),
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonEKSServicePolicy'),
      ],
    });
  }

  private createNodeRole(kmsCrossAccountUsagePolicy: iam.IManagedPolicy): iam.Role {
    const role = new iam.Role(this, 'EKSWorkerNodeRole', {
      assumedBy: new iam.ServicePrincipal('ec2.amazonaws.com'),
      managedPolicies: [
        kmsCrossAccountUsagePolicy,
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonEC2ContainerRegistryReadOnly'),
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonEKS_CNI_Policy'),
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonEKSWorkerNodePolicy'),
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonSSMManagedInstanceCore'),
        iam.ManagedPolicy.fromAwsManagedPolicyName('CloudWatchAgentServerPolicy'),
      ],
    });
    AlbControllerAddon.policyStatements().forEach((statement) => role.addToPrincipalPolicy(statement));
    return role;
  }
}
