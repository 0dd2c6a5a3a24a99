import { IsOptional, IsString, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class ImportCertificateDto {
  @ApiProperty({ description: 'Domain the certificate belongs to.', example: 'mail.example.com', maxLength: 253 })
  @IsString()
  @MaxLength(253)
  domain!: string;

  @ApiProperty({ description: 'Path of the PEM certificate on this host.', example: '/etc/ssl/operator/cert.pem' })
  @IsString()
  certificatePath!: string;

  @ApiProperty({ description: 'Path of the PEM private key on this host.', example: '/etc/ssl/operator/privkey.pem' })
  @IsString()
  privateKeyPath!: string;

  @ApiProperty({ description: 'Path of the intermediate chain, if separate.', required: false })
  @IsOptional()
  @IsString()
  chainPath?: string;
}
