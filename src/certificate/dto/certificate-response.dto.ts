import { ApiProperty } from '@nestjs/swagger';

export class CertificateRequestResponseDto {
  @ApiProperty({ example: '0f8fad5b-d9cb-469f-a165-70867728950e' })
  id!: string;

  @ApiProperty({ example: ['www.example.com'], type: [String] })
  fqdns!: string[];

  @ApiProperty({ required: false, example: 'admin@example.com' })
  contactEmail?: string;

  @ApiProperty({ enum: ['config', 'api'] })
  source!: 'config' | 'api';

  @ApiProperty({ example: '2025-01-01T00:00:00.000Z' })
  createdAt!: string;
}

export class IssuedCertificateResponseDto {
  @ApiProperty({ example: 'www.example.com' })
  name!: string;

  @ApiProperty({ example: ['www.example.com', 'example.com'], type: [String] })
  domains!: string[];

  @ApiProperty({ example: '2025-01-01T00:00:00.000Z' })
  issuedAt!: string;

  @ApiProperty({ example: '2025-04-01T00:00:00.000Z' })
  expiresAt!: string;

  @ApiProperty({ example: 45 })
  daysUntilExpiry!: number;
}
