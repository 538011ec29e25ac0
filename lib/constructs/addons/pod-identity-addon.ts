import * as eks from 'aws-cdk-lib/aws-eks';
import { Construct } from 'constructs';

export const POD_IDENTITY_AGENT_VERSION = 'v1.3.4-eksbuild.1';

export interface PodIdentityAddonProps {
  cluster: eks.ICluster;
  addonVersion?: string;
}

/**
 * EKS Pod Identity agent. Every other add-on here gets its AWS credentials
 * through it.
 */
export class PodIdentityAddon extends Construct {
  public readonly addon: eks.CfnAddon;

  constructor(scope: Construct, id: string, props: PodIdentityAddonProps) {
    super(scope, id);

    this.addon = new eks.CfnAddon(this, 'EksPodIdentityAddon', {
      clusterName: props.cluster.clusterName,
      addonName: 'eks-pod-identity-agent',
      addonVersion: props.addonVersion ?? POD_IDENTITY_AGENT_VERSION,
      resolveConflicts: 'OVERWRITE',
      preserveOnDelete: false,
      configurationValues: JSON.stringify({
        resources: {
          limits: {
            cpu: '200m',
            memory: '256Mi',
          },
          requests: {
            cpu: '100m',
            memory: '128Mi',
          },
        },
      }),
    });
  }
}
