import {
  BadGatewayException,
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiParam, ApiQuery, ApiResponse, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { CertificateService } from './certificate.service';
import { CertificateIntegrityService } from './integrity/certificate-integrity.service';
import { ApiKeyGuard } from './guards/api-key.guard';
import { CertificateNotFoundError, GenerationError } from './errors/certificate.errors';
import { DeactivateCertificateDto } from './dto/deactivate-certificate.dto';
import { GenerateCertificateDto } from './dto/generate-certificate.dto';
import { ImportCertificateDto } from './dto/import-certificate.dto';
import { VerifyCertificatesDto } from './dto/verify-certificates.dto';
import type { Certificate, DomainStatus, GenerationResult, IntegrityReport } from './interfaces';
import { isValidDomain } from '../config/config.validators';

/**
 * Operator API for inspecting and driving the certificate lifecycle.
 * Requires X-API-Key header on every route.
 */
@ApiTags('Certificates')
@ApiSecurity('api-key')
@UseGuards(ApiKeyGuard)
@Controller('api/certificates')
export class CertificateController {
  private readonly logger = new Logger(CertificateController.name);

  constructor(
    private readonly certificateService: CertificateService,
    private readonly integrityService: CertificateIntegrityService,
  ) {}

  /**
   * GET /api/certificates
   */
  @Get()
  @ApiOperation({ summary: 'List tracked certificates' })
  @ApiQuery({ name: 'domain', required: false })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  listCertificates(@Query('domain') domain?: string): Certificate[] {
    return this.certificateService.listCertificates(domain);
  }

  /**
   * GET /api/certificates/status/:domain
   * Selected certificate, last renewal, binding sync state and alarms.
   */
  @Get('status/:domain')
  @ApiOperation({ summary: 'Get the certificate status of a domain' })
  @ApiParam({ name: 'domain', description: 'Managed domain.' })
  @ApiResponse({ status: 400, description: 'The domain is not a valid hostname.' })
  getDomainStatus(@Param('domain') domain: string): DomainStatus {
    this.requireDomain(domain);
    return this.certificateService.getDomainStatus(domain);
  }

  /**
   * POST /api/certificates/generate
   */
  @Post('generate')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Generate a certificate',
    description: 'Returns the existing certificate unless it is no longer usable or force is set.',
  })
  @ApiResponse({ status: 400, description: 'Invalid domain or unsupported request.' })
  @ApiResponse({ status: 502, description: 'The certificate could not be produced.' })
  async generate(@Body() dto: GenerateCertificateDto): Promise<GenerationResult> {
    this.requireDomain(dto.domain);
    this.logger.debug(`POST /api/certificates/generate ${dto.domain} (${dto.type})`);

    try {
      return await this.certificateService.generate(dto.domain, dto.type, {
        force: dto.force,
        subjectAltNames: dto.subjectAltNames,
        trigger: 'api',
      });
    } catch (error) {
      throw this.toHttpException(error);
    }
  }

  /**
   * POST /api/certificates/import
   * Copies operator supplied files into the manual tree.
   */
  @Post('import')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Import a manually provided certificate' })
  @ApiResponse({ status: 400, description: 'The files are missing, unreadable or do not match the domain.' })
  async importManual(@Body() dto: ImportCertificateDto): Promise<Certificate> {
    this.requireDomain(dto.domain);

    try {
      return await this.certificateService.importManual(dto.domain, {
        certificatePath: dto.certificatePath,
        privateKeyPath: dto.privateKeyPath,
        chainPath: dto.chainPath,
      });
    } catch (error) {
      throw this.toHttpException(error);
    }
  }

  /**
   * POST /api/certificates/:id/deactivate
   */
  @Post(':id/deactivate')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Deactivate a certificate so it is never selected again' })
  @ApiResponse({ status: 404, description: 'Unknown certificate id.' })
  deactivate(@Param('id', ParseIntPipe) id: number, @Body() dto: DeactivateCertificateDto): Certificate {
    try {
      return this.certificateService.deactivate(id, dto.reason ?? 'deactivated by operator');
    } catch (error) {
      throw this.toHttpException(error);
    }
  }

  /**
   * POST /api/certificates/verify
   * Re-checks stored artifacts against the disk.
   */
  @Post('verify')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Verify certificate files against their recorded checksums' })
  @ApiOkResponse({ description: 'Integrity report; drifted files are flagged as needing verification.' })
  verify(@Body() dto: VerifyCertificatesDto): Promise<IntegrityReport> {
    return this.integrityService.verify(dto.certificateId);
  }

  private requireDomain(domain: string): void {
    if (!isValidDomain(domain)) {
      throw new BadRequestException(`Invalid domain: ${domain}`);
    }
  }

  private toHttpException(error: unknown): unknown {
    if (error instanceof CertificateNotFoundError) {
      return new NotFoundException(error.message);
    }
    if (error instanceof GenerationError) {
      if (error.reason === 'unsupported' || error.certificateType === 'manual') {
        return new BadRequestException(error.message);
      }
      return new BadGatewayException(`${error.message} (${error.reason})`);
    }
    return error;
  }
}
