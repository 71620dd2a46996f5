import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { DeliveryModule } from '../delivery/delivery.module';
import { HealthController } from './health.controller';

@Module({
  imports: [AuthModule, DeliveryModule],
  controllers: [HealthController],
})
export class HealthModule {}
