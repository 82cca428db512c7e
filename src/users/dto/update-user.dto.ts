import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

/**
 * The password is the only editable field and is required on every edit.
 */
export class UpdateUserDto {
  @ApiProperty({ example: 'CCdd2@2ee', type: String })
  @IsString()
  @IsNotEmpty()
  password!: string;
}
