import * as cdk from 'aws-cdk-lib';
import * as codebuild from 'aws-cdk-lib/aws-codebuild';
import * as codecommit from 'aws-cdk-lib/aws-codecommit';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as pipelines from 'aws-cdk-lib/pipelines';
import { Construct } from 'constructs';
import { Account } from '../config/account';
import { AppConfig, PipelineSource } from '../config/config';
import { EksClusterDeploymentStage, KeypairDeploymentStage } from './stages';

export interface PipelineStackProps extends cdk.StackProps {
  config: AppConfig;
}

export type StageKind = 'Keypair' | 'EksCluster';

/** `Keypair-Dev-eu-central-1` for key pairs, `Dev-EksCluster-eu-central-1` for clusters. */
export function stageName(phase: string, kind: StageKind, region: string): string {
  return kind === 'Keypair' ? `Keypair-${capitalize(phase)}-${region}` : `${capitalize(phase)}-${kind}-${region}`;
}

function capitalize(phase: string): string {
  return phase.charAt(0).toUpperCase() + phase.slice(1);
}

export function pipelineName(source: PipelineSource): string {
  return source.type === 'codecommit' ? source.repositoryName : source.repository.split('/')[1];
}

/**
 * Self-mutating CDK pipeline: synthesizes the app, runs the tests and an
 * audit, then rolls the key pair and EKS stages out to every configured
 * deployment account.
 */
export class PipelineStack extends cdk.Stack {
  public readonly pipeline: pipelines.CodePipeline;

  constructor(scope: Construct, id: string, props: PipelineStackProps) {
    super(scope, id, props);

    const { config } = props;
    const { clusterName, targetRegion } = config.eks;
    const name = pipelineName(config.pipeline.source);
    const targets = config.eks.deployments.map((deployment) => ({
      phase: deployment.phase,
      account: new Account(deployment.account, config, targetRegion),
    }));

    // The synth step reads cluster details during lookups
    const describeClusterPolicy = new iam.PolicyStatement({
      actions: ['eks:DescribeCluster'],
      resources: targets.map(
        ({ account }) => `arn:${cdk.Aws.PARTITION}:eks:${targetRegion}:${account.id}:cluster/${clusterName}`,
      ),
    });

    const accessEksParamsPolicy = new iam.PolicyStatement({
      actions: [
        'ssm:GetParameter',
        'ssm:GetParameters',
        'ssm:GetParameterHistory',
        'ssm:DescribeParameters',
        'ssm:PutParameter',
        'ssm:DeleteParameter',
        'ssm:AddTagsToResource',
      ],
      resources: targets.map(
        ({ account }) => `arn:${cdk.Aws.PARTITION}:ssm:${targetRegion}:${account.id}:parameter/eks/*`,
      ),
    });

    const source = this.createSource(config.pipeline.source);

    this.pipeline = new pipelines.CodePipeline(this, name, {
      pipelineName: name,
      crossAccountKeys: true,
      enableKeyRotation: true,
      synth: new pipelines.CodeBuildStep(`${name}-buildStep`, {
        input: source,
        buildEnvironment: {
          buildImage: codebuild.LinuxBuildImage.STANDARD_7_0,
          computeType: codebuild.ComputeType.SMALL,
        },
        installCommands: config.pipeline.synthInstallCommands,
        commands: ['npx cdk synth -q'],
        rolePolicyStatements: [describeClusterPolicy, accessEksParamsPolicy],
      }),
    });

    this.pipeline.addWave('Scanning', {
      pre: [
        new pipelines.ShellStep('Code Scanning', {
          input: source,
          commands: ['npm ci', 'npm audit --audit-level=high', 'npm test'],
        }),
      ],
    });

    targets.forEach(({ phase, account }) => {
      const env = { account: account.id, region: account.region };

      this.pipeline
        .addWave(`${capitalize(phase)}-Keypair`)
        .addStage(new KeypairDeploymentStage(this, stageName(phase, 'Keypair', account.region), { config, phase, env }));

      this.pipeline.addStage(
        new EksClusterDeploymentStage(this, stageName(phase, 'EksCluster', account.region), { config, phase, env }),
      );
    });
  }

  private createSource(source: PipelineSource): pipelines.CodePipelineSource {
    switch (source.type) {
      case 'codecommit': {
        const repository = codecommit.Repository.fromRepositoryName(
          this,
          `${source.repositoryName}-repo`,
          source.repositoryName,
        );
        return pipelines.CodePipelineSource.codeCommit(repository, source.branch, {
          codeBuildCloneOutput: true,
        });
      }
      case 'connection':
        return pipelines.CodePipelineSource.connection(source.repository, source.branch, {
          connectionArn: source.connectionArn,
          codeBuildCloneOutput: true,
        });
    }
  }
}
