import { BadRequestException, Body, Controller, Get, Put, UseGuards } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiResponse, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { ApiKeyGuard } from '../shared/guards/api-key.guard';
import { getErrorMessage } from '../shared/error.utils';
import { LifecycleService } from './lifecycle.service';
import { UpdateSettingsDto } from './dto/update-settings.dto';
import { LifecycleStatusDto } from './dto/lifecycle-status.dto';

@ApiTags('Lifecycle')
@ApiSecurity('api-key')
@UseGuards(ApiKeyGuard)
@Controller('api')
export class LifecycleController {
  constructor(private readonly lifecycleService: LifecycleService) {}

  /**
   * GET /api/status
   */
  @Get('status')
  @ApiOperation({ summary: 'Get Status', description: 'Current status, state machine flags and settings.' })
  @ApiOkResponse({ type: LifecycleStatusDto })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  getStatus(): LifecycleStatusDto {
    return this.lifecycleService.snapshot();
  }

  /**
   * PUT /api/settings
   * Resolves once the resulting configuration change has been handled.
   */
  @Put('settings')
  @ApiOperation({
    summary: 'Update Settings',
    description: 'Replaces the fqdn and/or contact address. A new fqdn resets the registration and is issued for.',
  })
  @ApiOkResponse({ type: LifecycleStatusDto })
  @ApiResponse({ status: 400, description: 'A value is malformed.' })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  async updateSettings(@Body() dto: UpdateSettingsDto): Promise<LifecycleStatusDto> {
    try {
      await this.lifecycleService.updateSettings(dto);
    } catch (error) {
      throw new BadRequestException(getErrorMessage(error));
    }

    return this.lifecycleService.snapshot();
  }
}
