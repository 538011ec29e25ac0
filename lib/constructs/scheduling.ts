/** Node label that marks nodes reserved for cluster system workloads. */
export const ADMIN_LABEL_KEY = 'purpose';
export const ADMIN_LABEL_VALUE = 'admin';

export interface Toleration {
  key?: string;
  operator: 'Equal' | 'Exists';
  value?: string;
  effect: 'NoSchedule' | 'PreferNoSchedule' | 'NoExecute';
}

export interface NodeAffinity {
  nodeAffinity: {
    requiredDuringSchedulingIgnoredDuringExecution: {
      nodeSelectorTerms: {
        matchExpressions: { key: string; operator: 'In'; values: string[] }[];
      }[];
    };
  };
}

/** Requires scheduling onto nodes labelled `purpose=admin`. */
export function adminNodeAffinity(): NodeAffinity {
  return {
    nodeAffinity: {
      requiredDuringSchedulingIgnoredDuringExecution: {
        nodeSelectorTerms: [
          {
            matchExpressions: [
              {
                key: ADMIN_LABEL_KEY,
                operator: 'In',
                values: [ADMIN_LABEL_VALUE],
              },
            ],
          },
        ],
      },
    },
  };
}

/** Tolerates the `purpose=admin:NoSchedule` taint on admin nodes. */
export function adminTolerations(): Toleration[] {
  return [
    {
      key: ADMIN_LABEL_KEY,
      operator: 'Equal',
      value: ADMIN_LABEL_VALUE,
      effect: 'NoSchedule',
    },
  ];
}
