import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GetParametersCommand, SSMClient } from '@aws-sdk/client-ssm';
import { AppConfig } from '../../../config/configuration';

@Injectable()
export class SsmService implements OnModuleDestroy {
  private readonly logger = new Logger(SsmService.name);
  private readonly client: SSMClient;

  constructor(private readonly configService: ConfigService<AppConfig>) {
    const awsConfig = this.configService.get('aws', { infer: true });

    this.client = new SSMClient({
      region: awsConfig?.region,
      ...(awsConfig?.endpoint && { endpoint: awsConfig.endpoint }),
      ...(awsConfig?.credentials && { credentials: awsConfig.credentials }),
    });
  }

  /**
   * Fetch up to 10 parameters (the GetParameters limit) with decryption.
   * Unknown names are reported in the log and left out of the result.
   */
  async getParameters(names: string[]): Promise<Record<string, string>> {
    const response = await this.client.send(
      new GetParametersCommand({
        Names: names,
        WithDecryption: true,
      }),
    );

    if (response.InvalidParameters && response.InvalidParameters.length > 0) {
      this.logger.warn(`Parameters not found: ${response.InvalidParameters.join(', ')}`);
    }

    const values: Record<string, string> = {};
    for (const parameter of response.Parameters ?? []) {
      if (parameter.Name && parameter.Value !== undefined) {
        values[parameter.Name] = parameter.Value;
      }
    }

    return values;
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}
