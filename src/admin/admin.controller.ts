import { Controller, Get, StreamableFile, UseGuards } from '@nestjs/common';
import { Roles } from '../auth/decorators/roles.decorator';
import { RolesGuard } from '../auth/guards/roles.guard';
import { SessionAuthGuard } from '../auth/guards/session-auth.guard';
import { RateLimiterService } from '../rate-limit/rate-limiter.service';
import { AdminService } from './admin.service';

@Controller('admin')
@UseGuards(SessionAuthGuard, RolesGuard)
export class AdminController {
  constructor(
    private readonly adminService: AdminService,
    private readonly rateLimiterService: RateLimiterService,
  ) {}

  /**
   * CSV download of every non-deleted submission
   */
  @Get('export')
  async exportCsv() {
    const { fileName, content } = await this.adminService.exportCsv();

    return new StreamableFile(content, {
      type: 'text/csv; charset=utf-8',
      disposition: `attachment; filename="${fileName}"`,
      length: content.length,
    });
  }

  @Get('analytics')
  async getAnalytics() {
    return this.adminService.getAnalytics();
  }

  @Get('rate-limits/stats')
  @Roles('admin')
  async getRateLimitStats() {
    return this.rateLimiterService.stats();
  }
}
