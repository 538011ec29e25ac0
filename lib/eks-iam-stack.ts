import * as cdk from 'aws-cdk-lib';
import * as iam from 'aws-cdk-lib/aws-iam';
import { Construct } from 'constructs';
import { AppConfig } from './config/config';

export interface EksIamStackProps extends cdk.StackProps {
  config: AppConfig;
}

export class EksIamStack extends cdk.Stack {
  /**
   * Lets worker nodes use KMS keys owned by the tooling account, e.g. to
   * launch from AMIs whose snapshots are encrypted there.
   */
  public readonly kmsCrossAccountUsagePolicy: iam.ManagedPolicy;

  constructor(scope: Construct, id: string, props: EksIamStackProps) {
    super(scope, id, props);

    const toolingAccountId = props.config.accounts.tooling.id;

    this.kmsCrossAccountUsagePolicy = new iam.ManagedPolicy(this, 'EksKmsCrossAccountUsagePolicy', {
      path: '/eks/',
      managedPolicyName: 'EksKmsCrossAccountUsagePolicy',
      statements: [
        new iam.PolicyStatement({
          effect: iam.Effect.ALLOW,
          actions: [
            'kms:CreateGrant',
            'kms:Decrypt',
            'kms:DescribeKey',
            'kms:GenerateDataKeyWithoutPlainText',
            'kms:ReEncrypt*',
          ],
          resources: [`arn:${cdk.Aws.PARTITION}:kms:*:${toolingAccountId}:key/*`],
        }),
      ],
    });
  }
}
