import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
  StreamableFile,
  UseGuards,
} from '@nestjs/common';
import { createReadStream } from 'fs';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import { Roles } from '../auth/decorators/roles.decorator';
import { RolesGuard } from '../auth/guards/roles.guard';
import { SessionAuthGuard } from '../auth/guards/session-auth.guard';
import type { SessionUser } from '../auth/interfaces/session-user.interface';
import { parseBulkStatusRequest } from './bulk-status';
import { BulkStatusDto, InboxQueryDto, UpdateFeedbackStatusDto, UpdateNoteDto } from './dto';
import { FeedbackService } from './feedback.service';

@Controller()
@UseGuards(SessionAuthGuard, RolesGuard)
export class FeedbackController {
  constructor(private readonly feedbackService: FeedbackService) {}

  // ==================== Read ====================

  /**
   * Filtered, paginated inbox with per-status counts
   */
  @Get('admin/inbox')
  async findInbox(@Query() query: InboxQueryDto) {
    return this.feedbackService.findInbox(query);
  }

  @Get('admin/feedback/:id')
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return this.feedbackService.findOne(id);
  }

  @Get('admin/feedback/:id/photo')
  async findPhoto(@Param('id', ParseIntPipe) id: number) {
    const photo = await this.feedbackService.findPhoto(id);
    return new StreamableFile(createReadStream(photo.absolutePath), {
      type: photo.contentType,
      disposition: 'inline',
    });
  }

  // ==================== Triage ====================

  @Post('api/feedback/bulk-status')
  @HttpCode(HttpStatus.OK)
  async bulkUpdateStatus(@Body() bulkStatusDto: BulkStatusDto) {
    const request = parseBulkStatusRequest(bulkStatusDto.ids, bulkStatusDto.status);
    const count = await this.feedbackService.bulkUpdateStatus(request);
    return { ok: true, count };
  }

  @Post('api/feedback/:id/status')
  @HttpCode(HttpStatus.OK)
  async updateStatus(
    @Param('id', ParseIntPipe) id: number,
    @Body() updateStatusDto: UpdateFeedbackStatusDto,
  ) {
    await this.feedbackService.updateStatus(id, updateStatusDto.status);
    return { ok: true };
  }

  @Post('api/feedback/:id/note')
  @HttpCode(HttpStatus.OK)
  async updateNote(@Param('id', ParseIntPipe) id: number, @Body() updateNoteDto: UpdateNoteDto) {
    await this.feedbackService.updateNote(id, updateNoteDto.note);
    return { ok: true };
  }

  // ==================== Admin only ====================

  @Post('api/feedback/:id/delete')
  @HttpCode(HttpStatus.OK)
  @Roles('admin')
  async softDelete(@Param('id', ParseIntPipe) id: number, @CurrentUser() user: SessionUser) {
    await this.feedbackService.softDelete(id, user.userId);
    return { ok: true };
  }

  @Post('api/feedback/:id/reprocess')
  @HttpCode(HttpStatus.OK)
  @Roles('admin')
  async reprocess(@Param('id', ParseIntPipe) id: number) {
    await this.feedbackService.reprocess(id);
    return { ok: true };
  }
}
