import * as cdk from 'aws-cdk-lib';
import { Match, Template } from 'aws-cdk-lib/assertions';
import { PipelineStack, pipelineName, stageName } from '../lib/pipeline/pipeline-stack';
import { DEV_ACCOUNT, TEST_REGION, TOOLING_ACCOUNT, testConfig } from './test-config';

describe('naming helpers', () => {
  test('names key pair and cluster stages by phase and region', () => {
    expect(stageName('dev', 'Keypair', 'eu-central-1')).toBe('Keypair-Dev-eu-central-1');
    expect(stageName('prod', 'EksCluster', 'us-east-1')).toBe('Prod-EksCluster-us-east-1');
  });

  test('names the pipeline after the repository', () => {
    expect(pipelineName({ type: 'codecommit', repositoryName: 'eks-infra', branch: 'main' })).toBe('eks-infra');
    expect(
      pipelineName({
        type: 'connection',
        repository: 'example-org/eks-infra',
        branch: 'main',
        connectionArn: 'test-connection-arn',
      }),
    ).toBe('eks-infra');
  });
});

describe('PipelineStack', () => {
  let template: Template;

  beforeAll(() => {
    const app = new cdk.App();
    const stack = new PipelineStack(app, 'TestPipelineStack', {
      env: { account: TOOLING_ACCOUNT, region: TEST_REGION },
      config: testConfig(),
    });
    template = Template.fromStack(stack);
  });

  test('creates a pipeline named after the repository', () => {
    template.hasResourceProperties('AWS::CodePipeline::Pipeline', {
      Name: 'eks-cdk-pipeline-test',
    });
  });

  test('encrypts artifacts with a rotating key', () => {
    template.hasResourceProperties('AWS::KMS::Key', {
      EnableKeyRotation: true,
    });
  });

  test('runs scanning before the key pair and cluster stages', () => {
    template.hasResourceProperties('AWS::CodePipeline::Pipeline', {
      Stages: Match.arrayWith([
        Match.objectLike({ Name: 'Source' }),
        Match.objectLike({ Name: 'Scanning' }),
        Match.objectLike({ Name: 'Dev-Keypair' }),
        Match.objectLike({ Name: 'Dev-EksCluster-eu-central-1' }),
      ]),
    });
  });

  test('synthesizes with cdk synth', () => {
    template.hasResourceProperties('AWS::CodeBuild::Project', {
      Environment: Match.objectLike({
        ComputeType: 'BUILD_GENERAL1_SMALL',
        Image: 'aws/codebuild/standard:7.0',
      }),
      Source: Match.objectLike({
        BuildSpec: Match.stringLikeRegexp('npx cdk synth -q'),
      }),
    });
  });

  test('scans with npm audit and the test suite', () => {
    template.hasResourceProperties('AWS::CodeBuild::Project', {
      Source: Match.objectLike({
        BuildSpec: Match.stringLikeRegexp('npm audit --audit-level=high'),
      }),
    });
  });

  test('lets the synth step describe the target cluster', () => {
    template.hasResourceProperties('AWS::IAM::Policy', {
      PolicyDocument: {
        Statement: Match.arrayWith([
          Match.objectLike({
            Action: 'eks:DescribeCluster',
            Resource: {
              'Fn::Join': [
                '',
                ['arn:', { Ref: 'AWS::Partition' }, `:eks:${TEST_REGION}:${DEV_ACCOUNT}:cluster/test-cluster`],
              ],
            },
          }),
        ]),
      },
    });
  });
});
