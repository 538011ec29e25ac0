import * as cdk from 'aws-cdk-lib';
import { Annotations, Match, Template } from 'aws-cdk-lib/assertions';
import * as eks from 'aws-cdk-lib/aws-eks';
import { AppConfig } from '../lib/config/config';
import { EksClusterStack } from '../lib/eks-cluster-stack';
import { EksIamStack } from '../lib/eks-iam-stack';
import { EksNetworkStack } from '../lib/eks-network-stack';
import { TEST_ENV, testConfig } from './test-config';

function clusterStack(config: AppConfig): EksClusterStack {
  const app = new cdk.App();
  const network = new EksNetworkStack(app, 'TestNetworkStack', { env: TEST_ENV, eks: config.eks, phase: 'dev' });
  const iam = new EksIamStack(app, 'TestIamStack', { env: TEST_ENV, config });
  return new EksClusterStack(app, 'TestClusterStack', {
    env: TEST_ENV,
    config,
    phase: 'dev',
    vpc: network.vpc,
    kmsCrossAccountUsagePolicy: iam.kmsCrossAccountUsagePolicy,
  });
}

describe('EksClusterStack', () => {
  let stack: EksClusterStack;
  let template: Template;

  beforeAll(() => {
    stack = clusterStack(testConfig());
    template = Template.fromStack(stack);
  });

  test('creates the cluster with the configured name and version', () => {
    template.hasResourceProperties('Custom::AWSCDK-EKS-Cluster', {
      Config: Match.objectLike({
        name: 'test-cluster',
        version: '1.31',
      }),
    });
  });

  test('installs CoreDNS pinned to the admin nodes', () => {
    template.hasResourceProperties('AWS::EKS::Addon', {
      AddonName: 'coredns',
      AddonVersion: 'v1.11.3-eksbuild.2',
      ResolveConflicts: 'OVERWRITE',
      PreserveOnDelete: false,
      ConfigurationValues: Match.serializedJson(
        Match.objectLike({
          replicaCount: 1,
          tolerations: [{ key: 'purpose', operator: 'Equal', value: 'admin', effect: 'NoSchedule' }],
        }),
      ),
    });
  });

  test('installs the Pod Identity agent', () => {
    template.hasResourceProperties('AWS::EKS::Addon', {
      AddonName: 'eks-pod-identity-agent',
      AddonVersion: 'v1.3.4-eksbuild.1',
    });
  });

  test('leaves optional add-ons out by default', () => {
    template.resourceCountIs('AWS::EKS::Addon', 2);
    template.resourcePropertiesCountIs(
      'Custom::AWSCDK-EKS-HelmChart',
      { Chart: 'cluster-autoscaler' },
      0,
    );
  });

  test('installs the load balancer controller', () => {
    template.hasResourceProperties('Custom::AWSCDK-EKS-HelmChart', {
      Chart: 'aws-load-balancer-controller',
      Release: 'aws-load-balancer-controller',
      Repository: 'https://aws.github.io/eks-charts',
      Namespace: 'kube-system',
      Version: '1.8.2',
    });
    template.hasResourceProperties('AWS::EKS::PodIdentityAssociation', {
      Namespace: 'kube-system',
      ServiceAccount: 'application-loadbalancer',
    });
  });

  test('creates one managed node group per entry', () => {
    template.resourceCountIs('AWS::EKS::Nodegroup', 2);
    template.hasResourceProperties('AWS::EKS::Nodegroup', {
      NodegroupName: 'admin',
      CapacityType: 'ON_DEMAND',
      AmiType: 'AL2_ARM_64',
      InstanceTypes: ['t4g.medium'],
      ScalingConfig: { MinSize: 1, MaxSize: 2, DesiredSize: 1 },
      Labels: { purpose: 'admin' },
      Taints: [{ Key: 'purpose', Value: 'admin', Effect: 'NO_SCHEDULE' }],
    });
    template.hasResourceProperties('AWS::EKS::Nodegroup', {
      NodegroupName: 'general',
      CapacityType: 'SPOT',
    });
  });

  test('gives worker nodes the tooling KMS policy', () => {
    template.hasResourceProperties('AWS::IAM::Role', {
      AssumeRolePolicyDocument: {
        Statement: [Match.objectLike({ Principal: { Service: 'ec2.amazonaws.com' } })],
      },
      ManagedPolicyArns: Match.arrayWith([
        Match.objectLike({ 'Fn::ImportValue': Match.stringLikeRegexp('EksKmsCrossAccountUsagePolicy') }),
      ]),
    });
  });

  test('launches the bastion with the admin key pair', () => {
    template.hasResourceProperties('AWS::EC2::Instance', {
      InstanceType: 't4g.nano',
      KeyName: 'test-admin',
    });
    template.hasResourceProperties('AWS::EC2::SecurityGroupIngress', {
      IpProtocol: 'tcp',
      FromPort: 443,
      ToPort: 443,
      Description: 'Allow access from bastion host to EKS cluster API server',
    });
  });

  test('creates the Karpenter interruption queue and rules', () => {
    template.hasResourceProperties('AWS::SQS::Queue', {
      QueueName: 'test-cluster',
      MessageRetentionPeriod: 300,
    });
    template.resourceCountIs('AWS::Events::Rule', 4);
    template.hasResourceProperties('AWS::Events::Rule', {
      EventPattern: {
        source: ['aws.ec2'],
        'detail-type': ['EC2 Spot Instance Interruption Warning'],
      },
    });
  });

  test('scopes the Karpenter roles to the cluster', () => {
    template.hasResourceProperties('AWS::IAM::Role', {
      RoleName: 'KarpenterNodeRole-test-cluster',
    });
    template.hasResourceProperties('AWS::IAM::ManagedPolicy', {
      ManagedPolicyName: 'KarpenterControllerPolicy-test-cluster',
    });
    template.hasResourceProperties('AWS::EKS::PodIdentityAssociation', {
      Namespace: 'karpenter',
      ServiceAccount: 'karpenter',
    });
  });

  test('installs the Karpenter chart at the configured version', () => {
    template.hasResourceProperties('Custom::AWSCDK-EKS-HelmChart', {
      Chart: 'karpenter',
      Repository: 'oci://public.ecr.aws/karpenter/karpenter',
      Namespace: 'karpenter',
      Version: '1.0.0',
    });
  });

  test('prints the kubeconfig command', () => {
    template.hasOutput('KubectlCommand', {
      Value: 'aws eks update-kubeconfig --region eu-central-1 --name test-cluster',
    });
  });

  test('reports no warnings for the default layout', () => {
    Annotations.fromStack(stack).hasNoWarning('*', Match.stringLikeRegexp('purpose=admin'));
  });
});

describe('EksClusterStack variations', () => {
  test('warns when no node group is reserved for system add-ons', () => {
    const stack = clusterStack(
      testConfig((raw) => {
        raw.eks.nodeGroups[1].labels.purpose = 'general';
      }),
    );

    Annotations.fromStack(stack).hasWarning(
      '*',
      Match.stringLikeRegexp('No node group is labelled purpose=admin'),
    );
  });

  test('warns when Karpenter and the Cluster Autoscaler are both enabled', () => {
    const stack = clusterStack(
      testConfig((raw) => {
        raw.eks.addons.clusterAutoscaler = true;
      }),
    );
    const template = Template.fromStack(stack);

    template.hasResourceProperties('Custom::AWSCDK-EKS-HelmChart', {
      Chart: 'cluster-autoscaler',
      Repository: 'https://kubernetes.github.io/autoscaler',
      Namespace: 'kube-system',
    });
    Annotations.fromStack(stack).hasWarning(
      '*',
      Match.stringLikeRegexp('Karpenter and the Cluster Autoscaler are both enabled'),
    );
  });

  test('installs the optional add-ons when toggled on', () => {
    const stack = clusterStack(
      testConfig((raw) => {
        raw.eks.addons.ebsCsiDriver = true;
        raw.eks.addons.fluentBit = true;
      }),
    );
    const template = Template.fromStack(stack);

    template.hasResourceProperties('AWS::EKS::Addon', {
      AddonName: 'aws-ebs-csi-driver',
      AddonVersion: 'v1.32.0-eksbuild.1',
    });
    template.hasResourceProperties('AWS::EKS::PodIdentityAssociation', {
      Namespace: 'kube-system',
      ServiceAccount: 'ebs-csi-controller-sa',
    });
    template.hasResourceProperties('Custom::AWSCDK-EKS-HelmChart', {
      Chart: 'aws-for-fluent-bit',
      Version: '0.1.34',
    });
  });

  test('skips Karpenter when disabled', () => {
    const stack = clusterStack(
      testConfig((raw) => {
        raw.eks.karpenter.enabled = false;
      }),
    );
    const template = Template.fromStack(stack);

    expect(stack.karpenter).toBeUndefined();
    template.resourceCountIs('AWS::SQS::Queue', 0);
    template.resourceCountIs('AWS::Events::Rule', 0);
    Annotations.fromStack(stack).hasInfo('*', Match.stringLikeRegexp('Karpenter is disabled'));
  });
});

// Manifests carrying tokens synthesize to Fn::Join; tokens render as TOKEN
function renderText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'object' && value !== null && 'Fn::Join' in value) {
    const join: unknown = value['Fn::Join'];
    if (Array.isArray(join) && typeof join[0] === 'string' && Array.isArray(join[1])) {
      return join[1].map(renderText).join(join[0]);
    }
  }
  return 'TOKEN';
}

function manifestTexts(template: Template): string[] {
  const resources = template.findResources('Custom::AWSCDK-EKS-KubernetesResource');
  return Object.values(resources).map((resource) => renderText(resource.Properties.Manifest));
}

interface KubernetesObject {
  kind?: string;
  metadata?: { name?: string };
  [key: string]: unknown;
}

function findManifest(template: Template, kind: string, name: string): KubernetesObject {
  const found = manifestTexts(template)
    .filter((text) => text.includes(`"kind":"${kind}"`))
    .flatMap((text): KubernetesObject[] => JSON.parse(text))
    .find((manifest) => manifest.kind === kind && manifest.metadata?.name === name);
  if (found === undefined) {
    throw new Error(`no ${kind} named ${name}`);
  }
  return found;
}

describe('Karpenter resources', () => {
  let stack: EksClusterStack;
  let template: Template;
  let gpuPool: eks.KubernetesManifest;

  beforeAll(() => {
    stack = clusterStack(testConfig());
    const karpenter = stack.karpenter;
    if (karpenter === undefined) {
      throw new Error('Karpenter should be enabled by default');
    }
    karpenter.addEc2NodeClass('gpu', { amiSelectorTerms: [{ alias: 'bottlerocket@latest' }] });
    gpuPool = karpenter.addNodePool('gpu', { limits: { cpu: '16' } });
    template = Template.fromStack(stack);
  });

  test('creates the default EC2NodeClass from the configuration', () => {
    expect(findManifest(template, 'EC2NodeClass', 'default')).toMatchObject({
      apiVersion: 'karpenter.k8s.aws/v1',
      spec: {
        amiSelectorTerms: [{ alias: 'al2023@latest' }],
        subnetSelectorTerms: [{ tags: { 'karpenter.sh/discovery': 'test-cluster' } }],
        role: 'TOKEN',
      },
    });
  });

  test('creates the default NodePool from the configuration', () => {
    expect(findManifest(template, 'NodePool', 'default')).toMatchObject({
      apiVersion: 'karpenter.sh/v1',
      spec: {
        template: {
          spec: {
            requirements: expect.arrayContaining([
              { key: 'karpenter.sh/capacity-type', operator: 'In', values: ['spot', 'on-demand'] },
              { key: 'karpenter.k8s.aws/instance-category', operator: 'In', values: ['c', 'm', 'r'] },
            ]),
            nodeClassRef: { group: 'karpenter.k8s.aws', kind: 'EC2NodeClass', name: 'default' },
          },
        },
        limits: { cpu: '100' },
      },
    });
  });

  test('adds further node classes and pools', () => {
    expect(findManifest(template, 'EC2NodeClass', 'gpu')).toMatchObject({
      apiVersion: 'karpenter.k8s.aws/v1',
      spec: { amiSelectorTerms: [{ alias: 'bottlerocket@latest' }] },
    });
    expect(findManifest(template, 'NodePool', 'gpu')).toMatchObject({
      apiVersion: 'karpenter.sh/v1',
      spec: { limits: { cpu: '16' } },
    });
  });

  test('applies node classes and pools after the chart', () => {
    const chart = stack.karpenter?.helmDeploy.chart;

    expect(stack.karpenter?.defaultNodeClass.node.dependencies).toContain(chart);
    expect(stack.karpenter?.defaultNodePool.node.dependencies).toEqual(
      expect.arrayContaining([chart, stack.karpenter?.defaultNodeClass]),
    );
    expect(gpuPool.node.dependencies).toContain(chart);
  });

  test('maps the Karpenter node role and the bastion role in aws-auth', () => {
    const awsAuth = manifestTexts(template).find((text) => text.includes('"name":"aws-auth"'));

    expect(awsAuth).toContain('system:node:{{EC2PrivateDNSName}}');
    expect(awsAuth).toContain('system:bootstrappers');
    expect(awsAuth).toContain('system:masters');
  });
});
