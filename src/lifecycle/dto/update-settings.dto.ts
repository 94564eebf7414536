import { IsEmail, IsFQDN, IsOptional, IsString, ValidateIf } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class UpdateSettingsDto {
  @ApiProperty({
    description: 'Domain to keep a certificate for. An empty string clears the setting.',
    example: 'www.example.com',
    required: false,
  })
  @IsOptional()
  @IsString()
  @ValidateIf((dto: UpdateSettingsDto) => dto.fqdn !== '')
  @IsFQDN()
  fqdn?: string;

  @ApiProperty({
    description: 'ACME account contact. An empty string registers without an email address.',
    example: 'admin@example.com',
    required: false,
  })
  @IsOptional()
  @IsString()
  @ValidateIf((dto: UpdateSettingsDto) => dto.contactEmail !== '')
  @IsEmail()
  contactEmail?: string;
}
