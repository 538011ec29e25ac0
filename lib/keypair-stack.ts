import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import { Construct } from 'constructs';
import { AdminConfig } from './config/config';

export interface KeypairStackProps extends cdk.StackProps {
  admin: AdminConfig;
}

/** Imports the administrator's public key as an EC2 key pair. */
export class KeypairStack extends cdk.Stack {
  public readonly adminKeyPair: ec2.CfnKeyPair;

  constructor(scope: Construct, id: string, props: KeypairStackProps) {
    super(scope, id, props);

    this.adminKeyPair = new ec2.CfnKeyPair(this, 'AdminKeyPair', {
      keyName: props.admin.keyName,
      publicKeyMaterial: props.admin.publicKeyMaterial,
    });

    new cdk.CfnOutput(this, 'AdminKeyPairId', {
      value: this.adminKeyPair.attrKeyPairId,
      description: 'Admin key pair ID',
    });
  }
}
