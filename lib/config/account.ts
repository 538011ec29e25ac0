import { AppConfig, ConfigError } from './config';

/**
 * An AWS account referenced by its label in the `accounts` section.
 */
export class Account {
  public readonly label: string;
  public readonly id: string;
  public readonly region: string;

  static idFromLabel(label: string, config: AppConfig): string | undefined {
    return config.accounts[label]?.id;
  }

  static labelFromId(id: string, config: AppConfig): string | undefined {
    return Object.entries(config.accounts).find(([, account]) => account.id === id)?.[0];
  }

  constructor(label: string, config: AppConfig, region?: string) {
    const id = Account.idFromLabel(label, config);
    if (id === undefined) {
      throw new ConfigError(`accounts.${label}`, 'unknown account label');
    }
    this.label = label;
    this.id = id;
    this.region = region ?? config.pipeline.region;
  }
}
