import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as eks from 'aws-cdk-lib/aws-eks';
import * as iam from 'aws-cdk-lib/aws-iam';
import { Construct } from 'constructs';
import { AmiTypeName, CapacityTypeName, NodeGroupConfig, TaintEffectName } from '../config/config';
import { ADMIN_LABEL_KEY, ADMIN_LABEL_VALUE } from './scheduling';

const AMI_TYPES: Record<AmiTypeName, eks.NodegroupAmiType> = {
  AL2_ARM_64: eks.NodegroupAmiType.AL2_ARM_64,
  AL2_x86_64: eks.NodegroupAmiType.AL2_X86_64,
  AL2023_ARM_64_STANDARD: eks.NodegroupAmiType.AL2023_ARM_64_STANDARD,
  AL2023_x86_64_STANDARD: eks.NodegroupAmiType.AL2023_X86_64_STANDARD,
  BOTTLEROCKET_ARM_64: eks.NodegroupAmiType.BOTTLEROCKET_ARM_64,
  BOTTLEROCKET_x86_64: eks.NodegroupAmiType.BOTTLEROCKET_X86_64,
};

const CAPACITY_TYPES: Record<CapacityTypeName, eks.CapacityType> = {
  spot: eks.CapacityType.SPOT,
  'on-demand': eks.CapacityType.ON_DEMAND,
};

const TAINT_EFFECTS: Record<TaintEffectName, eks.TaintEffect> = {
  NO_SCHEDULE: eks.TaintEffect.NO_SCHEDULE,
  PREFER_NO_SCHEDULE: eks.TaintEffect.PREFER_NO_SCHEDULE,
  NO_EXECUTE: eks.TaintEffect.NO_EXECUTE,
};

export interface NodeGroupsProps {
  cluster: eks.ICluster;
  nodeRole: iam.IRole;
  subnets: ec2.SubnetSelection;
  nodeGroups: NodeGroupConfig[];
}

/** Managed node groups, one per configuration entry, sharing one node role. */
export class NodeGroups extends Construct {
  public readonly nodegroups: Record<string, eks.Nodegroup> = {};
  /** Whether some group carries the `purpose=admin` label system add-ons are pinned to */
  public readonly hasAdminCapacity: boolean;

  constructor(scope: Construct, id: string, props: NodeGroupsProps) {
    super(scope, id);

    props.nodeGroups.forEach((group) => {
      this.nodegroups[group.name] = new eks.Nodegroup(this, group.name, {
        cluster: props.cluster,
        nodegroupName: group.name,
        amiType: AMI_TYPES[group.amiType],
        capacityType: CAPACITY_TYPES[group.capacityType],
        instanceTypes: group.instanceTypes.map((type) => new ec2.InstanceType(type)),
        subnets: props.subnets,
        nodeRole: props.nodeRole,
        minSize: group.minSize,
        maxSize: group.maxSize,
        desiredSize: group.desiredSize,
        labels: group.labels,
        taints: group.taints.map((taint) => ({
          key: taint.key,
          value: taint.value,
          effect: TAINT_EFFECTS[taint.effect],
        })),
      });
    });

    this.hasAdminCapacity = props.nodeGroups.some((group) => group.labels[ADMIN_LABEL_KEY] === ADMIN_LABEL_VALUE);
  }
}
