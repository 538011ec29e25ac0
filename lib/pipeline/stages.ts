import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import { AppConfig } from '../config/config';
import { EksClusterStack } from '../eks-cluster-stack';
import { EksIamStack } from '../eks-iam-stack';
import { EksNetworkStack } from '../eks-network-stack';
import { EksSsmParametersStack } from '../eks-ssm-parameters-stack';
import { KeypairStack } from '../keypair-stack';

export interface DeploymentStageProps extends cdk.StageProps {
  config: AppConfig;
  /** Deployment phase, e.g. `dev` */
  phase: string;
}

/** Deploys the admin key pair ahead of the cluster, whose bastion uses it. */
export class KeypairDeploymentStage extends cdk.Stage {
  public readonly keypairStack: KeypairStack;

  constructor(scope: Construct, id: string, props: DeploymentStageProps) {
    super(scope, id, props);

    this.keypairStack = new KeypairStack(this, 'KeypairStack', {
      description: 'Keypair for EC2 instances',
      admin: props.config.admin,
    });
  }
}

/**
 * Network and IAM first, then the cluster, then the SSM parameters
 * describing it.
 */
export class EksClusterDeploymentStage extends cdk.Stage {
  public readonly networkStack: EksNetworkStack;
  public readonly iamStack: EksIamStack;
  public readonly clusterStack: EksClusterStack;
  public readonly parametersStack: EksSsmParametersStack;

  constructor(scope: Construct, id: string, props: DeploymentStageProps) {
    super(scope, id, props);

    const { config, phase } = props;

    this.networkStack = new EksNetworkStack(this, 'EksNetworkStack', {
      description: 'EKS Network Stack',
      eks: config.eks,
      phase,
    });

    this.iamStack = new EksIamStack(this, 'EksIamStack', {
      description: 'EKS IAM Stack',
      config,
    });

    this.clusterStack = new EksClusterStack(this, 'EksClusterStack', {
      description: 'EKS Cluster Stack',
      config,
      phase,
      vpc: this.networkStack.vpc,
      kmsCrossAccountUsagePolicy: this.iamStack.kmsCrossAccountUsagePolicy,
    });
    this.clusterStack.addStackDependency(this.networkStack);
    this.clusterStack.addStackDependency(this.iamStack);

    this.parametersStack = new EksSsmParametersStack(this, 'EksSSMParametersStack', {
      description: 'EKS cluster parameters in SSM',
      cluster: this.clusterStack.cluster,
    });
    this.parametersStack.addStackDependency(this.clusterStack);
  }
}
