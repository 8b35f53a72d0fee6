import { Module } from '@nestjs/common';
import { RelayModule } from '../relay';
import { BroadcastModule } from '../transport/telegram/broadcast.module';
import { AdmissionService } from './admission.service';

@Module({
  imports: [RelayModule, BroadcastModule],
  providers: [AdmissionService],
  exports: [AdmissionService],
})
export class AdmissionModule {}
