import { Body, Controller, Delete, Get, HttpCode, Param, ParseIntPipe, Post, Put } from '@nestjs/common';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { TrackedProduct } from '../database/interfaces/database.interface';
import { AddProductDto, EmailAlertsDto, addProductSchema, emailAlertsSchema } from './dto/tracker.schemas';
import { TrackerService } from './tracker.service';

@Controller('api')
export class TrackerController {
  constructor(private readonly trackerService: TrackerService) {}

  @Get('products')
  listProducts(): TrackedProduct[] {
    return this.trackerService.listProducts();
  }

  @Post('products')
  addProduct(@Body(new ZodValidationPipe(addProductSchema)) body: AddProductDto): TrackedProduct {
    return this.trackerService.addProduct(body.url, body.source);
  }

  @Delete('products/:id')
  @HttpCode(204)
  removeProduct(@Param('id', ParseIntPipe) id: number): void {
    this.trackerService.removeProduct(id);
  }

  @Get('settings/email-alerts')
  getEmailAlerts(): EmailAlertsDto {
    return { enabled: this.trackerService.emailAlertsEnabled() };
  }

  @Put('settings/email-alerts')
  setEmailAlerts(@Body(new ZodValidationPipe(emailAlertsSchema)) body: EmailAlertsDto): EmailAlertsDto {
    return { enabled: this.trackerService.setEmailAlerts(body.enabled) };
  }
}
