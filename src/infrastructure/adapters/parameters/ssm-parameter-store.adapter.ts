import { Injectable, Logger } from '@nestjs/common';
import { ParameterStorePort } from '../../../application/ports/output/parameter-store.port';
import { SsmService } from '../../../shared/aws/ssm/ssm.service';

/**
 * SSM Parameter Store Adapter
 * Implements ParameterStorePort using AWS Systems Manager Parameter Store
 */
@Injectable()
export class SsmParameterStoreAdapter implements ParameterStorePort {
  private readonly logger = new Logger(SsmParameterStoreAdapter.name);

  constructor(private readonly ssmService: SsmService) {}

  async getParameters(names: string[]): Promise<Record<string, string>> {
    this.logger.debug(`Fetching ${names.length} parameters from Parameter Store`);

    return this.ssmService.getParameters(names);
  }
}
