import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Headers,
  HttpStatus,
  Ip,
  Logger,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  StreamableFile,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiBody, ApiConsumes, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { OverrideImportService } from './override-import.service';
import { ImportOverridesDto, OverrideTemplateQueryDto } from './dto/import-overrides.dto';
import { CSV_DELIMITER_NAMES } from './override-import.constants';
import { ImportMode } from './override-import.types';

// Browsers label CSV uploads inconsistently
const ALLOWED_MIME_TYPES = ['text/csv', 'text/plain', 'application/csv', 'application/vnd.ms-excel', 'application/octet-stream'];

@ApiTags('Quiz overrides')
@Controller('quizzes/:quizId/overrides')
export class OverrideImportController {
  private readonly logger = new Logger(OverrideImportController.name);

  constructor(private readonly overrideImportService: OverrideImportService) {}

  @Post('import')
  @UseInterceptors(FileInterceptor('file'))
  @ApiConsumes('multipart/form-data')
  @ApiParam({ name: 'quizId', format: 'uuid' })
  @ApiBody({
    schema: {
      type: 'object',
      required: ['file', 'mode'],
      properties: {
        file: { type: 'string', format: 'binary' },
        mode: { type: 'string', enum: Object.values(ImportMode) },
        delimiter: { type: 'string', enum: CSV_DELIMITER_NAMES },
        encoding: { type: 'string', example: 'utf-8' },
      },
    },
  })
  @ApiOperation({ summary: 'Upload an override CSV and preview the changes' })
  @ApiResponse({ status: 201, description: 'Preview of every row with its action and errors' })
  @ApiResponse({ status: 400, description: 'Unreadable file or wrong column headers' })
  async preview(
    @Param('quizId', ParseUUIDPipe) quizId: string,
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() dto: ImportOverridesDto,
    @Ip() ip?: string,
    @Headers('user-agent') userAgent?: string,
  ) {
    if (!file) {
      throw new BadRequestException('No file uploaded');
    }
    if (!ALLOWED_MIME_TYPES.includes(file.mimetype)) {
      this.logger.warn(`Unsupported file type: ${file.mimetype}`);
      throw new BadRequestException('Unsupported file type. Upload a .csv or .txt file');
    }
    return this.overrideImportService.preview(quizId, file.buffer, dto, { ipAddress: ip, userAgent });
  }

  @Post('import/:importId/commit')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Apply a previewed import in one transaction' })
  @ApiResponse({ status: 200, description: 'Counts of inserted, updated and deleted overrides' })
  @ApiResponse({ status: 404, description: 'Unknown or expired import' })
  async commit(
    @Param('quizId', ParseUUIDPipe) quizId: string,
    @Param('importId', ParseUUIDPipe) importId: string,
    @Ip() ip?: string,
    @Headers('user-agent') userAgent?: string,
  ) {
    return this.overrideImportService.commit(quizId, importId, { ipAddress: ip, userAgent });
  }

  @Delete('import/:importId')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Discard a previewed import' })
  async discard(
    @Param('quizId', ParseUUIDPipe) quizId: string,
    @Param('importId', ParseUUIDPipe) importId: string,
  ): Promise<void> {
    await this.overrideImportService.discard(quizId, importId);
  }

  @Get('template')
  @ApiOperation({ summary: 'Download the current overrides in the import format' })
  @ApiResponse({ status: 200, description: 'CSV file' })
  async downloadTemplate(
    @Param('quizId', ParseUUIDPipe) quizId: string,
    @Query() query: OverrideTemplateQueryDto,
  ): Promise<StreamableFile> {
    const template = await this.overrideImportService.template(quizId, query.mode);
    return new StreamableFile(Buffer.from(template.content, 'utf-8'), {
      type: 'text/csv; charset=utf-8',
      disposition: `attachment; filename="${template.fileName}"`,
    });
  }
}
