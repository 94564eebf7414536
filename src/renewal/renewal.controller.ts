import { Controller, HttpCode, HttpStatus, Post, UseGuards } from '@nestjs/common';
import { ApiAcceptedResponse, ApiOperation, ApiResponse, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { ApiKeyGuard } from '../shared/guards/api-key.guard';
import { RenewalSchedulerService } from './renewal-scheduler.service';

@ApiTags('Certificates')
@ApiSecurity('api-key')
@Controller('api/certificates')
export class RenewalController {
  constructor(private readonly renewalScheduler: RenewalSchedulerService) {}

  /**
   * POST /api/certificates/renew
   * Same effect as the periodic trigger firing now.
   */
  @Post('renew')
  @UseGuards(ApiKeyGuard)
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({
    summary: 'Request a Renewal',
    description: 'Raises the renewal flag. The renewal runs asynchronously and only when a certificate is due.',
  })
  @ApiAcceptedResponse({ description: 'The renewal was requested.' })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  requestRenewal(): { message: string } {
    this.renewalScheduler.requestRenewal();
    return { message: 'Renewal requested' };
  }
}
