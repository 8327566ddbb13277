import { Controller, Get, Header, Query } from '@nestjs/common';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { DashboardService } from './dashboard.service';
import { priceFiltersSchema } from './dto/price-filters.schema';
import { FilterOptions, PriceFilters, PricePoint, TrendSeries } from './interfaces/dashboard.interface';

const filtersPipe = new ZodValidationPipe(priceFiltersSchema);

@Controller('api/prices')
export class DashboardController {
  constructor(private readonly dashboardService: DashboardService) {}

  @Get()
  getPrices(@Query(filtersPipe) filters: PriceFilters): PricePoint[] {
    return this.dashboardService.getPrices(filters);
  }

  @Get('products')
  getFilterOptions(): FilterOptions {
    return this.dashboardService.getFilterOptions();
  }

  @Get('latest')
  getLatest(@Query(filtersPipe) filters: PriceFilters): PricePoint[] {
    return this.dashboardService.getLatest(filters);
  }

  @Get('trends')
  getTrends(@Query(filtersPipe) filters: PriceFilters): TrendSeries[] {
    return this.dashboardService.getTrends(filters);
  }

  @Get('export.csv')
  @Header('Content-Type', 'text/csv; charset=utf-8')
  @Header('Content-Disposition', 'attachment; filename="price_data.csv"')
  exportCsv(@Query(filtersPipe) filters: PriceFilters): string {
    return this.dashboardService.exportCsv(filters);
  }
}
