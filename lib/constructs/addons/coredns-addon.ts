import * as eks from 'aws-cdk-lib/aws-eks';
import { Construct } from 'constructs';
import { adminNodeAffinity, adminTolerations } from '../scheduling';

export const COREDNS_ADDON_VERSION = 'v1.11.3-eksbuild.2';

export interface CoreDnsAddonProps {
  cluster: eks.ICluster;
  addonVersion?: string;
}

/** Managed CoreDNS, shrunk to a single replica on the admin nodes. */
export class CoreDnsAddon extends Construct {
  public readonly addon: eks.CfnAddon;

  constructor(scope: Construct, id: string, props: CoreDnsAddonProps) {
    super(scope, id);

    const configuration = {
      resources: {
        requests: {
          cpu: '100m',
          memory: '70Mi',
        },
        limits: {
          cpu: '100m',
          memory: '170Mi',
        },
      },
      replicaCount: 1,
      affinity: adminNodeAffinity(),
      tolerations: adminTolerations(),
    };

    this.addon = new eks.CfnAddon(this, 'EksCoreDnsAddOn', {
      clusterName: props.cluster.clusterName,
      addonName: 'coredns',
      addonVersion: props.addonVersion ?? COREDNS_ADDON_VERSION,
      resolveConflicts: 'OVERWRITE',
      preserveOnDelete: false,
      configurationValues: JSON.stringify(configuration),
    });
  }
}
