import * as eks from 'aws-cdk-lib/aws-eks';
import * as iam from 'aws-cdk-lib/aws-iam';
import { Construct } from 'constructs';

export const POD_IDENTITY_PRINCIPAL = 'pods.eks.amazonaws.com';
export const DEFAULT_SERVICE_ACCOUNT_NAME = 'helm-deploy-serviceaccount';

export type HelmValues = Record<string, unknown>;

export interface HelmDeployWithPodIdentityProps {
  cluster: eks.ICluster;
  chart: string;
  /** Helm release name; also names the IAM role `<release>-Role` */
  release: string;
  repository: string;
  namespace: string;
  values?: HelmValues;
  version?: string;
  /**
   * Kubernetes service account bound to the role
   * @default 'helm-deploy-serviceaccount'
   */
  serviceAccountName?: string;
  rolePolicyStatements?: iam.PolicyStatement[];
}

/**
 * Creates a role for EKS Pod Identity, associates it with the chart's
 * service account and installs the chart.
 */
export class HelmDeployWithPodIdentity extends Construct {
  public readonly role: iam.Role;
  public readonly chart: eks.HelmChart;
  public readonly podIdentityAssociation: eks.CfnPodIdentityAssociation;
  public readonly serviceAccountName: string;
  /** Values as handed to Helm, service account block included */
  public readonly values: HelmValues;

  constructor(scope: Construct, id: string, props: HelmDeployWithPodIdentityProps) {
    super(scope, id);

    this.serviceAccountName = props.serviceAccountName ?? DEFAULT_SERVICE_ACCOUNT_NAME;

    this.role = createPodIdentityRole(this, `${props.release}-Role`, `${props.release}-Role`);
    (props.rolePolicyStatements ?? []).forEach((statement) => this.role.addToPolicy(statement));

    this.podIdentityAssociation = new eks.CfnPodIdentityAssociation(this, `${props.release}-PodIdentityAssociation`, {
      clusterName: props.cluster.clusterName,
      namespace: props.namespace,
      roleArn: this.role.roleArn,
      serviceAccount: this.serviceAccountName,
    });

    this.values = withServiceAccount(props.values ?? {}, this.serviceAccountName, this.role.roleArn);

    this.chart = props.cluster.addHelmChart(`${props.release}-Chart`, {
      chart: props.chart,
      release: props.release,
      repository: props.repository,
      namespace: props.namespace,
      createNamespace: true,
      values: this.values,
      version: props.version,
    });
  }
}

/**
 * A role assumable by EKS Pod Identity. The agent needs `sts:TagSession`
 * next to `sts:AssumeRole`.
 */
export function createPodIdentityRole(scope: Construct, id: string, roleName?: string): iam.Role {
  const role = new iam.Role(scope, id, {
    roleName,
    assumedBy: new iam.ServicePrincipal(POD_IDENTITY_PRINCIPAL),
  });
  role.assumeRolePolicy?.addStatements(
    new iam.PolicyStatement({
      effect: iam.Effect.ALLOW,
      principals: [new iam.ServicePrincipal(POD_IDENTITY_PRINCIPAL)],
      actions: ['sts:AssumeRole', 'sts:TagSession'],
    }),
  );
  return role;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns a copy of `values` whose `serviceAccount` block names the account
 * and carries the role annotation. Caller-provided `name` and `create` win.
 */
export function withServiceAccount(values: HelmValues, serviceAccountName: string, roleArn: string): HelmValues {
  const serviceAccount = isRecord(values.serviceAccount) ? values.serviceAccount : {};
  const annotations = isRecord(serviceAccount.annotations) ? serviceAccount.annotations : {};
  return {
    ...values,
    serviceAccount: {
      name: serviceAccountName,
      create: true,
      ...serviceAccount,
      annotations: {
        ...annotations,
        'eks.amazonaws.com/role-arn': roleArn,
      },
    },
  };
}
