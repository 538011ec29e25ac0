import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as eks from 'aws-cdk-lib/aws-eks';
import * as iam from 'aws-cdk-lib/aws-iam';
import { Construct } from 'constructs';

export interface BastionHostProps {
  cluster: eks.Cluster;
  vpc: ec2.IVpc;
  /** Name of an existing EC2 key pair, see KeypairStack */
  keyName: string;
  /** @default t4g.nano */
  instanceType?: ec2.InstanceType;
}

/**
 * Jump host in a public subnet with kubectl, helm and the AWS CLI. Its role
 * is mapped to `system:masters`, so the private API endpoint is reachable
 * from it with cluster-admin rights.
 */
export class BastionHost extends Construct {
  public readonly role: iam.Role;
  public readonly securityGroup: ec2.SecurityGroup;
  public readonly instance: ec2.Instance;

  constructor(scope: Construct, id: string, props: BastionHostProps) {
    super(scope, id);

    this.role = new iam.Role(this, 'EksBastionRole', {
      assumedBy: new iam.ServicePrincipal('ec2.amazonaws.com'),
      managedPolicies: [
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonEC2ContainerRegistryFullAccess'),
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonEC2ReadOnlyAccess'),
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonSSMManagedInstanceCore'),
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonEKSClusterPolicy'),
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonEKSServicePolicy'),
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonEKSWorkerNodePolicy'),
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonEKSVPCResourceController'),
      ],
    });
    props.cluster.awsAuth.addMastersRole(this.role);

    this.securityGroup = new ec2.SecurityGroup(this, 'EksBastionSecurityGroup', {
      vpc: props.vpc,
      description: 'Security group for bastion host',
      allowAllOutbound: true,
    });

    props.cluster.clusterSecurityGroup.addIngressRule(
      this.securityGroup,
      ec2.Port.tcp(443),
      'Allow access from bastion host to EKS cluster API server',
    );

    this.instance = new ec2.Instance(this, 'EksBastionInstance', {
      vpc: props.vpc,
      vpcSubnets: { subnetType: ec2.SubnetType.PUBLIC },
      instanceType: props.instanceType ?? new ec2.InstanceType('t4g.nano'),
      machineImage: ec2.MachineImage.latestAmazonLinux2({
        cpuType: ec2.AmazonLinuxCpuType.ARM_64,
      }),
      role: this.role,
      securityGroup: this.securityGroup,
      keyPair: ec2.KeyPair.fromKeyPairAttributes(this, 'EksBastionKeyPair', {
        keyPairName: props.keyName,
        type: ec2.KeyPairType.RSA,
      }),
    });

    this.instance.addUserData(...bastionUserData(cdk.Stack.of(this).region));

    new cdk.CfnOutput(this, 'BastionInstancePublicIp', {
      value: this.instance.instancePublicIp,
      description: 'Public IP of the bastion host',
    });
  }
}

export function bastionUserData(region: string): string[] {
  const bashrc = '/home/ec2-user/.bashrc';
  return [
    'yum update -y',
    'yum install -y jq curl git unzip',
    'curl -sSLo /bin/kubectl https://s3.us-west-2.amazonaws.com/amazon-eks/1.31.0/2024-09-12/bin/linux/arm64/kubectl',
    'chmod +x /bin/kubectl',
    '/bin/kubectl completion bash > /etc/bash_completion.d/kubectl',
    'curl -sSL https://raw.githubusercontent.com/helm/helm/main/scripts/get-helm-3 | bash',
    'yum install -y amazon-ssm-agent',
    'systemctl enable amazon-ssm-agent',
    'systemctl start amazon-ssm-agent',
    'yum remove -y awscli',
    'curl -sSL https://awscli.amazonaws.com/awscli-exe-linux-aarch64.zip -o awscliv2.zip',
    'unzip -q awscliv2.zip',
    './aws/install --bin-dir /usr/local/bin --install-dir /usr/local/aws-cli --update',
    `echo 'export AWS_DEFAULT_REGION=${region}' >> ${bashrc}`,
    `echo 'export PATH=/usr/local/bin:$PATH' >> ${bashrc}`,
    `echo 'alias k="kubectl"' >> ${bashrc}`,
    `echo 'source <(kubectl completion bash)' >> ${bashrc}`,
    `echo 'complete -F __start_kubectl k' >> ${bashrc}`,
  ];
}
