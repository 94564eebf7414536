import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  UseGuards,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { ApiAcceptedResponse, ApiOkResponse, ApiOperation, ApiResponse, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { ApiKeyGuard } from '../shared/guards/api-key.guard';
import { getErrorMessage } from '../shared/error.utils';
import { RequestStoreService } from '../state/request-store.service';
import type { CertificateRequest } from '../state/interfaces';
import { LIFECYCLE_EVENT } from '../lifecycle/lifecycle.events';
import { CertificateInventoryService } from './storage/certificate-inventory.service';
import { CreateCertificateRequestDto } from './dto/create-certificate-request.dto';
import { CertificateRequestResponseDto, IssuedCertificateResponseDto } from './dto/certificate-response.dto';

@ApiTags('Certificates')
@ApiSecurity('api-key')
@UseGuards(ApiKeyGuard)
@Controller('api/certificates')
export class CertificateController {
  private readonly logger = new Logger(CertificateController.name);

  constructor(
    private readonly requestStore: RequestStoreService,
    private readonly inventory: CertificateInventoryService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * POST /api/certificates/requests
   * Queues a certificate request and wakes the lifecycle.
   */
  @Post('requests')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({
    summary: 'Request a Certificate',
    description: 'Queues a request for one certificate covering the given names. Issuance happens asynchronously.',
  })
  @ApiAcceptedResponse({ type: CertificateRequestResponseDto, description: 'The request was queued.' })
  @ApiResponse({ status: 400, description: 'The names or the contact address are malformed.' })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  requestCertificate(@Body() dto: CreateCertificateRequestDto): CertificateRequestResponseDto {
    const request = this.appendRequest(dto);
    this.logger.log(`Certificate requested for ${request.fqdns.join(', ')}`);
    this.eventEmitter.emit(LIFECYCLE_EVENT, 'certificate-requested');

    return { ...request, fqdns: [...request.fqdns] };
  }

  /**
   * GET /api/certificates/requests
   */
  @Get('requests')
  @ApiOperation({ summary: 'List Pending Certificate Requests' })
  @ApiOkResponse({ type: [CertificateRequestResponseDto] })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  listRequests(): CertificateRequestResponseDto[] {
    return this.requestStore.pendingRequests().map((request) => ({ ...request, fqdns: [...request.fqdns] }));
  }

  /**
   * GET /api/certificates
   */
  @Get()
  @ApiOperation({
    summary: 'List Issued Certificates',
    description: 'Certificates found in the client configuration directory, with their validity.',
  })
  @ApiOkResponse({ type: [IssuedCertificateResponseDto] })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  async listCertificates(): Promise<IssuedCertificateResponseDto[]> {
    const certificates = await this.inventory.list();

    return certificates.map((certificate) => ({
      ...certificate,
      issuedAt: certificate.issuedAt.toISOString(),
      expiresAt: certificate.expiresAt.toISOString(),
    }));
  }

  private appendRequest(dto: CreateCertificateRequestDto): CertificateRequest {
    try {
      return this.requestStore.append(dto.fqdns, dto.contactEmail, 'api');
    } catch (error) {
      throw new BadRequestException(getErrorMessage(error));
    }
  }
}
