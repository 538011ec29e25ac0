import * as cdk from 'aws-cdk-lib';
import * as eks from 'aws-cdk-lib/aws-eks';
import * as iam from 'aws-cdk-lib/aws-iam';
import { Construct } from 'constructs';
import { createPodIdentityRole } from '../helm-deploy-with-pod-identity';
import { adminNodeAffinity } from '../scheduling';

export const EBS_CSI_DRIVER_VERSION = 'v1.32.0-eksbuild.1';

export interface EbsCsiDriverAddonProps {
  cluster: eks.ICluster;
  addonVersion?: string;
}

export class EbsCsiDriverAddon extends Construct {
  public readonly role: iam.Role;
  public readonly addon: eks.CfnAddon;
  public readonly podIdentityAssociation: eks.CfnPodIdentityAssociation;

  constructor(scope: Construct, id: string, props: EbsCsiDriverAddonProps) {
    super(scope, id);

    this.role = createPodIdentityRole(this, 'EbsCsiDriverAddonRole', 'EbsCsiDriverAddonRole');
    this.role.attachInlinePolicy(
      new iam.Policy(this, 'EbsCsiDriverPolicy', {
        document: ebsCsiPolicyDocument(),
      }),
    );

    const resources = {
      requests: {
        cpu: '100m',
        memory: '128Mi',
      },
      limits: {
        cpu: '400m',
        memory: '512Mi',
      },
    };

    this.addon = new eks.CfnAddon(this, 'EbsCsiDriverAddon', {
      clusterName: props.cluster.clusterName,
      addonName: 'aws-ebs-csi-driver',
      addonVersion: props.addonVersion ?? EBS_CSI_DRIVER_VERSION,
      resolveConflicts: 'OVERWRITE',
      preserveOnDelete: false,
      configurationValues: JSON.stringify({
        controller: {
          replicaCount: 1,
          resources,
          affinity: adminNodeAffinity(),
          // The controller may run on any tainted node, admin or not
          tolerations: [{ operator: 'Exists', effect: 'NoSchedule' }],
        },
        node: {
          resources,
        },
      }),
    });

    this.podIdentityAssociation = new eks.CfnPodIdentityAssociation(this, 'EbsCsiDriverAddonRoleAssociation', {
      clusterName: props.cluster.clusterName,
      namespace: 'kube-system',
      roleArn: this.role.roleArn,
      serviceAccount: 'ebs-csi-controller-sa',
    });
  }
}

function ebsCsiPolicyDocument(): iam.PolicyDocument {
  const partition = cdk.Aws.PARTITION;
  const volumesAndSnapshots = [
    `arn:${partition}:ec2:*:*:volume/*`,
    `arn:${partition}:ec2:*:*:snapshot/*`,
  ];
  const whenTagged = (action: string, conditionKey: string, tag: string, value: string) =>
    new iam.PolicyStatement({
      actions: [action],
      resources: ['*'],
      conditions: { StringLike: { [`${conditionKey}/${tag}`]: value } },
    });

  return new iam.PolicyDocument({
    statements: [
      new iam.PolicyStatement({
        actions: [
          'ec2:CreateSnapshot',
          'ec2:AttachVolume',
          'ec2:DetachVolume',
          'ec2:ModifyVolume',
          'ec2:DescribeAvailabilityZones',
          'ec2:DescribeInstances',
          'ec2:DescribeSnapshots',
          'ec2:DescribeTags',
          'ec2:DescribeVolumes',
          'ec2:DescribeVolumesModifications',
        ],
        resources: ['*'],
      }),
      new iam.PolicyStatement({
        actions: ['ec2:CreateTags'],
        resources: volumesAndSnapshots,
        conditions: {
          StringEquals: { 'ec2:CreateAction': ['CreateVolume', 'CreateSnapshot'] },
        },
      }),
      new iam.PolicyStatement({
        actions: ['ec2:DeleteTags'],
        resources: volumesAndSnapshots,
      }),
      whenTagged('ec2:CreateVolume', 'aws:RequestTag', 'ebs.csi.aws.com/cluster', 'true'),
      whenTagged('ec2:CreateVolume', 'aws:RequestTag', 'CSIVolumeName', '*'),
      whenTagged('ec2:DeleteVolume', 'ec2:ResourceTag', 'ebs.csi.aws.com/cluster', 'true'),
      whenTagged('ec2:DeleteVolume', 'ec2:ResourceTag', 'CSIVolumeName', '*'),
      whenTagged('ec2:DeleteVolume', 'ec2:ResourceTag', 'kubernetes.io/created-for/pvc/name', '*'),
      whenTagged('ec2:DeleteSnapshot', 'ec2:ResourceTag', 'CSIVolumeSnapshotName', '*'),
      whenTagged('ec2:DeleteSnapshot', 'ec2:ResourceTag', 'ebs.csi.aws.com/cluster', 'true'),
    ],
  });
}
