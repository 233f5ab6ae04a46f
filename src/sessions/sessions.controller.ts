import {
  Controller,
  Get,
  Header,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  ParseUUIDPipe,
  Post,
  UploadedFiles,
  UseFilters,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FilesInterceptor } from '@nestjs/platform-express';
import {
  ApiBody,
  ApiConsumes,
  ApiCreatedResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { envs } from 'src/config/envs';
import { RateLimitGuard } from 'src/rate-limit/rate-limit.guard';
import {
  SessionStatusDto,
  toSessionStatus,
  toUploadResponse,
  UploadResponseDto,
} from './dto/session-response.dto';
import { UploadedDocument } from './dto/uploaded-document.dto';
import { UploadLimitsFilter } from './filters/upload-limits.filter';
import { SessionsService } from './sessions.service';

const UPLOAD_FORM = `
<body>
<form action="${envs.apiPrefix.replace(/\/$/, '')}/uploadfiles" enctype="multipart/form-data" method="post">
<input name="files" type="file" accept="application/pdf" multiple>
<input type="submit">
</form>
</body>
`;

@ApiTags('Sessions')
@Controller()
export class SessionsController {
  logger: Logger = new Logger(SessionsController.name);

  constructor(private readonly sessionsService: SessionsService) {}

  @Post('uploadfiles')
  @UseGuards(RateLimitGuard)
  @UseInterceptors(
    // Un byte de margen: el tamaño exacto lo valida el servicio con su mensaje
    FilesInterceptor('files', envs.maxFilesPerUpload, {
      limits: {
        fileSize: envs.maxFileSizeBytes + 1,
        files: envs.maxFilesPerUpload,
      },
    }),
  )
  @UseFilters(UploadLimitsFilter)
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary:
      'Sube uno o más PDF y crea una sesión para preguntar sobre ellos en tiempo real',
  })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      properties: {
        files: { type: 'array', items: { type: 'string', format: 'binary' } },
      },
    },
  })
  @ApiCreatedResponse({ type: UploadResponseDto })
  async upload(
    @UploadedFiles() files: Express.Multer.File[] | undefined,
  ): Promise<UploadResponseDto> {
    const documents: UploadedDocument[] = (files ?? []).map((file) => ({
      originalName: file.originalname,
      mimeType: file.mimetype,
      size: file.size,
      buffer: file.buffer,
    }));

    const session = await this.sessionsService.createSession(documents);
    return toUploadResponse(session);
  }

  @Get('sessions/:sessionId')
  @UseGuards(RateLimitGuard)
  @ApiOperation({ summary: 'Estado de la sesión y de la ingesta de cada documento' })
  @ApiOkResponse({ type: SessionStatusDto })
  getSession(
    @Param('sessionId', new ParseUUIDPipe()) sessionId: string,
  ): SessionStatusDto {
    return toSessionStatus(this.sessionsService.getSessionOrFail(sessionId));
  }

  @Get()
  @Header('Content-Type', 'text/html; charset=utf-8')
  @ApiOperation({ summary: 'Formulario HTML mínimo para probar la subida' })
  uploadForm(): string {
    return UPLOAD_FORM;
  }
}
