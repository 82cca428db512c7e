import { ApiProperty } from '@nestjs/swagger';
import {
  IsArray,
  IsNotEmpty,
  IsString,
  Length,
  Matches,
} from 'class-validator';
import { LOGIN_PATTERN } from '../domain/user-candidate';

export class CreateUserDto {
  @ApiProperty({ example: 'jane.doe', type: String })
  @IsString()
  @Length(3, 64)
  @Matches(LOGIN_PATTERN, { message: 'invalidLogin' })
  login!: string;

  // strength is checked by the password policy, which answers 422
  @ApiProperty({ example: 'AAbb1!1cc', type: String })
  @IsString()
  @IsNotEmpty()
  password!: string;

  @ApiProperty({
    example: ['ROLE_ACME_LOCAL_USER'],
    type: [String],
    description: 'Names of existing roles; ROLE_ADMIN can not be granted',
  })
  @IsArray()
  @IsString({ each: true })
  roles!: string[];
}
