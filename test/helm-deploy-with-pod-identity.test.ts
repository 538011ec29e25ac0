import { KubectlV31Layer } from '@aws-cdk/lambda-layer-kubectl-v31';
import * as cdk from 'aws-cdk-lib';
import { Match, Template } from 'aws-cdk-lib/assertions';
import * as eks from 'aws-cdk-lib/aws-eks';
import * as iam from 'aws-cdk-lib/aws-iam';
import { HelmDeployWithPodIdentity, withServiceAccount } from '../lib/constructs/helm-deploy-with-pod-identity';
import { DEV_ACCOUNT, TEST_ENV } from './test-config';

describe('withServiceAccount', () => {
  test('adds the service account block', () => {
    expect(withServiceAccount({ replicas: 1 }, 'demo-sa', 'test-role-arn')).toEqual({
      replicas: 1,
      serviceAccount: {
        name: 'demo-sa',
        create: true,
        annotations: { 'eks.amazonaws.com/role-arn': 'test-role-arn' },
      },
    });
  });

  test('keeps caller settings except the role annotation', () => {
    const values = withServiceAccount(
      {
        serviceAccount: {
          create: false,
          annotations: { team: 'platform', 'eks.amazonaws.com/role-arn': 'stale-role-arn' },
        },
      },
      'demo-sa',
      'test-role-arn',
    );

    expect(values.serviceAccount).toEqual({
      name: 'demo-sa',
      create: false,
      annotations: { team: 'platform', 'eks.amazonaws.com/role-arn': 'test-role-arn' },
    });
  });

  test('does not modify its input', () => {
    const input = { serviceAccount: { annotations: { team: 'platform' } } };
    withServiceAccount(input, 'demo-sa', 'test-role-arn');

    expect(input).toEqual({ serviceAccount: { annotations: { team: 'platform' } } });
  });
});

describe('HelmDeployWithPodIdentity', () => {
  let deploy: HelmDeployWithPodIdentity;
  let template: Template;

  beforeAll(() => {
    const app = new cdk.App();
    const stack = new cdk.Stack(app, 'TestHelmStack', { env: TEST_ENV });
    const cluster = eks.Cluster.fromClusterAttributes(stack, 'Cluster', {
      clusterName: 'test-cluster',
      kubectlRoleArn: `arn:aws:iam::${DEV_ACCOUNT}:role/test-kubectl`,
      kubectlLayer: new KubectlV31Layer(stack, 'kubectl'),
    });

    deploy = new HelmDeployWithPodIdentity(stack, 'Demo', {
      cluster,
      chart: 'demo-chart',
      release: 'demo',
      repository: 'https://charts.example.com',
      namespace: 'demo',
      version: '0.1.0',
      values: { replicas: 2 },
      rolePolicyStatements: [
        new iam.PolicyStatement({ actions: ['s3:GetObject'], resources: ['arn:aws:s3:::test-bucket/*'] }),
      ],
    });
    template = Template.fromStack(stack);
  });

  test('creates a role Pod Identity can assume', () => {
    template.hasResourceProperties('AWS::IAM::Role', {
      RoleName: 'demo-Role',
      AssumeRolePolicyDocument: {
        Statement: Match.arrayWith([
          Match.objectLike({
            Action: ['sts:AssumeRole', 'sts:TagSession'],
            Principal: { Service: 'pods.eks.amazonaws.com' },
          }),
        ]),
      },
    });
  });

  test('attaches the given statements to the role', () => {
    template.hasResourceProperties('AWS::IAM::Policy', {
      PolicyDocument: {
        Statement: [Match.objectLike({ Action: 's3:GetObject', Resource: 'arn:aws:s3:::test-bucket/*' })],
      },
    });
  });

  test('associates the default service account with the role', () => {
    template.hasResourceProperties('AWS::EKS::PodIdentityAssociation', {
      ClusterName: 'test-cluster',
      Namespace: 'demo',
      ServiceAccount: 'helm-deploy-serviceaccount',
    });
    expect(deploy.serviceAccountName).toBe('helm-deploy-serviceaccount');
  });

  test('installs the chart into a created namespace', () => {
    template.hasResourceProperties('Custom::AWSCDK-EKS-HelmChart', {
      Chart: 'demo-chart',
      Release: 'demo',
      Repository: 'https://charts.example.com',
      Namespace: 'demo',
      Version: '0.1.0',
      CreateNamespace: true,
    });
  });

  test('hands the service account block to Helm', () => {
    expect(deploy.values.replicas).toBe(2);
    expect(deploy.values.serviceAccount).toMatchObject({
      name: 'helm-deploy-serviceaccount',
      create: true,
    });
  });
});
