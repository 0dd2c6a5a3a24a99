import { ArrayMaxSize, IsArray, IsBoolean, IsIn, IsOptional, IsString, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { CERTIFICATE_TYPES } from '../certificate.constants';
import type { CertificateType } from '../certificate.constants';

export class GenerateCertificateDto {
  @ApiProperty({ description: 'Domain to issue the certificate for.', example: 'mail.example.com', maxLength: 253 })
  @IsString()
  @MaxLength(253)
  domain!: string;

  @ApiProperty({
    description: 'Certificate type to generate. Manual certificates are imported, not generated.',
    enum: CERTIFICATE_TYPES.filter((type) => type !== 'manual'),
    example: 'self-signed',
  })
  @IsIn(CERTIFICATE_TYPES.filter((type) => type !== 'manual'))
  type!: CertificateType;

  @ApiProperty({
    description: 'Regenerate even when the current certificate is still usable.',
    required: false,
    default: false,
  })
  @IsOptional()
  @IsBoolean()
  force?: boolean;

  @ApiProperty({
    description: 'Additional subject alternative names.',
    required: false,
    type: [String],
    example: ['imap.example.com'],
  })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(100)
  @IsString({ each: true })
  subjectAltNames?: string[];
}
