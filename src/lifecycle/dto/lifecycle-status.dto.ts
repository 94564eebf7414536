import { ApiProperty } from '@nestjs/swagger';

export class WorkloadStatusDto {
  @ApiProperty({ enum: ['blocked', 'waiting', 'active'] })
  state!: 'blocked' | 'waiting' | 'active';

  @ApiProperty({ example: 'registered www.example.com' })
  message!: string;

  @ApiProperty({ example: '2025-01-01T00:00:00.000Z' })
  updatedAt!: string;
}

export class LifecycleFlagsDto {
  @ApiProperty() installed!: boolean;
  @ApiProperty() registered!: boolean;
  @ApiProperty() certificateRequested!: boolean;
  @ApiProperty() fqdnConfigured!: boolean;
  @ApiProperty() fqdnChanged!: boolean;
  @ApiProperty() fqdnFailed!: boolean;
  @ApiProperty() renewRequested!: boolean;
  @ApiProperty() renewalArmed!: boolean;
  @ApiProperty() disabled!: boolean;
  @ApiProperty() renewDisabled!: boolean;
}

export class LifecycleStatusDto {
  @ApiProperty({ type: WorkloadStatusDto, nullable: true })
  status!: WorkloadStatusDto | null;

  @ApiProperty({ type: LifecycleFlagsDto })
  flags!: LifecycleFlagsDto;

  @ApiProperty({ example: 'www.example.com' })
  fqdn!: string;

  @ApiProperty({ example: '' })
  contactEmail!: string;

  @ApiProperty({ example: 0 })
  pendingRequests!: number;

  @ApiProperty({ example: '17 6,18 * * *', nullable: true, type: String })
  renewalSchedule!: string | null;

  @ApiProperty({ nullable: true, type: String })
  lastRenewedAt!: string | null;
}
