#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { Account } from '../lib/config/account';
import { loadConfig } from '../lib/config/config';
import { PipelineStack } from '../lib/pipeline/pipeline-stack';

const config = loadConfig();
const toolingAccount = new Account(config.pipeline.account, config);

const app = new cdk.App();

new PipelineStack(app, 'EKS-PipelineStack', {
  env: {
    account: toolingAccount.id,
    region: toolingAccount.region,
  },
  description: `CDK pipeline deploying EKS cluster ${config.eks.clusterName}`,
  config,
  tags: {
    Project: config.eks.clusterName,
    ManagedBy: 'CDK',
  },
});

console.log(
  `Pipeline in ${toolingAccount.label} (${toolingAccount.id}/${toolingAccount.region}) deploying ` +
    config.eks.deployments.map((d) => `${d.phase}@${d.account}`).join(', '),
);

app.synth();
