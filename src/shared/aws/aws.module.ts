import { Module } from '@nestjs/common';
import { S3Module } from './s3/s3.module';
import { SsmModule } from './ssm/ssm.module';

@Module({
  imports: [S3Module, SsmModule],
  exports: [S3Module, SsmModule],
})
export class AwsModule {}
