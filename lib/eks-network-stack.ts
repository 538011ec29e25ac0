import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as ssm from 'aws-cdk-lib/aws-ssm';
import { Construct } from 'constructs';
import { EksConfig } from './config/config';

export interface EksNetworkStackProps extends cdk.StackProps {
  eks: EksConfig;
  /** Deployment phase, e.g. `dev` */
  phase: string;
}

/**
 * VPC for the cluster: public subnets for internet-facing load balancers,
 * private subnets with egress for nodes and internal load balancers.
 */
export class EksNetworkStack extends cdk.Stack {
  public readonly vpc: ec2.Vpc;

  constructor(scope: Construct, id: string, props: EksNetworkStackProps) {
    super(scope, id, props);

    const { clusterName } = props.eks;

    this.vpc = new ec2.Vpc(this, 'EksVpc', {
      ipAddresses: ec2.IpAddresses.cidr(props.eks.vpcCidr),
      maxAzs: props.eks.maxAzs,
      natGateways: props.eks.natGateways,
      subnetConfiguration: [
        {
          cidrMask: 19,
          name: 'PublicSubnet',
          subnetType: ec2.SubnetType.PUBLIC,
        },
        {
          cidrMask: 19,
          name: 'PrivateSubnet',
          subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
        },
      ],
    });

    cdk.Tags.of(this.vpc).add('Phase', props.phase);

    // Subnet discovery for the load balancer controller and Karpenter
    this.vpc.publicSubnets.forEach((subnet) => {
      cdk.Tags.of(subnet).add(`kubernetes.io/cluster/${clusterName}`, 'shared');
      cdk.Tags.of(subnet).add('kubernetes.io/role/elb', '1');
    });

    this.vpc.privateSubnets.forEach((subnet) => {
      cdk.Tags.of(subnet).add(`kubernetes.io/cluster/${clusterName}`, 'shared');
      cdk.Tags.of(subnet).add('kubernetes.io/role/internal-elb', '1');
      cdk.Tags.of(subnet).add('karpenter.sh/discovery', clusterName);
    });

    new ssm.StringParameter(this, 'EksVpcId', {
      parameterName: '/eks/vpc_id',
      stringValue: this.vpc.vpcId,
    });

    new cdk.CfnOutput(this, 'VpcId', {
      value: this.vpc.vpcId,
      description: 'EKS VPC ID',
    });
  }
}
