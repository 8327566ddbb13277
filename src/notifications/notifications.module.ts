import { Module } from '@nestjs/common';
import { appConfig } from '../config/app.config';
import { EmailService } from './email.service';
import { EMAIL_OPTIONS } from './notifications.constants';

@Module({
  providers: [{ provide: EMAIL_OPTIONS, useValue: appConfig.email }, EmailService],
  exports: [EmailService],
})
export class NotificationsModule {}
