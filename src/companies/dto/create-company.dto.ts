import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsNotEmpty, IsString, Length, Matches, MaxLength } from 'class-validator';
import { ROLE_ALIAS_PATTERN } from '../domain/company-candidate';

export class CreateCompanyDto {
  @ApiProperty({ example: 'Acme Corporation', type: String })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @ApiProperty({
    example: 'ACME',
    type: String,
    description:
      'Tenant alias (letters and digits, starting with a letter). ' +
      'Upper-cased and embedded in the tenant role names; immutable.',
  })
  @Transform(({ value }) =>
    typeof value === 'string' ? value.trim().toUpperCase() : value,
  )
  @IsString()
  @Length(2, 20)
  @Matches(ROLE_ALIAS_PATTERN, { message: 'invalidRoleAlias' })
  roleAlias!: string;
}
