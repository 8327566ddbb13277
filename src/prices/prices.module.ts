import { Module } from '@nestjs/common';
import { NotificationsModule } from '../notifications/notifications.module';
import { TrackerModule } from '../tracker/tracker.module';
import { DashboardController } from './dashboard.controller';
import { DashboardService } from './dashboard.service';
import { PriceRecorderService } from './price-recorder.service';

@Module({
  imports: [TrackerModule, NotificationsModule],
  controllers: [DashboardController],
  providers: [PriceRecorderService, DashboardService],
  exports: [PriceRecorderService],
})
export class PricesModule {}
