import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class UpdateCompanyDto {
  @ApiPropertyOptional({ example: 'Acme Holdings', type: String })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name?: string;

  @ApiPropertyOptional({
    example: 'ACME',
    type: String,
    description:
      'Must equal the stored alias; the alias can not be changed or cleared.',
  })
  @IsOptional()
  @IsString()
  roleAlias?: string | null;
}
