import { Global, Module } from '@nestjs/common';
import { KeepAliveService } from './services/keep-alive.service';

@Global()
@Module({
  providers: [KeepAliveService],
  exports: [KeepAliveService],
})
export class CommonModule {}
