import { Module } from '@nestjs/common';
import { ExemptPathPolicy } from './exempt-path.policy';
import { ClientFingerprintMiddleware } from './middleware/client-fingerprint.middleware';

@Module({
  providers: [ExemptPathPolicy, ClientFingerprintMiddleware],
  exports: [ExemptPathPolicy, ClientFingerprintMiddleware],
})
export class ClientContextModule {}
