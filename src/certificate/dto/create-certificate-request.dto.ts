import { ArrayNotEmpty, ArrayUnique, IsArray, IsEmail, IsFQDN, IsOptional, IsString, ValidateIf } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class CreateCertificateRequestDto {
  @ApiProperty({
    description: 'Names the certificate covers. The first one names the certificate directory.',
    example: ['www.example.com', 'example.com'],
    type: [String],
  })
  @IsArray()
  @ArrayNotEmpty()
  @ArrayUnique((fqdn: string) => fqdn.toLowerCase())
  @IsFQDN({}, { each: true })
  fqdns!: string[];

  @ApiProperty({
    description: 'ACME account contact. Empty or absent registers without an email address.',
    example: 'admin@example.com',
    required: false,
  })
  @IsOptional()
  @IsString()
  @ValidateIf((dto: CreateCertificateRequestDto) => dto.contactEmail !== '')
  @IsEmail()
  contactEmail?: string;
}
