import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  Req,
  UploadedFile,
  UseFilters,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import type { Request } from 'express';
import { SubmitFeedbackDto } from './dto/submit-feedback.dto';
import { UploadLimitFilter } from './filters/upload-limit.filter';
import { SubmissionsService } from './submissions.service';

@Controller()
export class SubmissionsController {
  constructor(private readonly submissionsService: SubmissionsService) {}

  /**
   * Anonymous feedback form (multipart/form-data)
   */
  @Post('submit')
  @HttpCode(HttpStatus.CREATED)
  @UseFilters(UploadLimitFilter)
  @UseInterceptors(FileInterceptor('photo'))
  async submit(
    @Body() submitFeedbackDto: SubmitFeedbackDto,
    @UploadedFile() photo: Express.Multer.File | undefined,
    @Req() request: Request,
  ) {
    return this.submissionsService.submit({
      ...submitFeedbackDto,
      photo,
      clientAddress: request.ip,
      userAgent: request.get('user-agent'),
    });
  }
}
