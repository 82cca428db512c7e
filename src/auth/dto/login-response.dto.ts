import { ApiProperty } from '@nestjs/swagger';

export class LoginResponseDto {
  @ApiProperty()
  token!: string;

  @ApiProperty({ description: 'Expiry as epoch milliseconds' })
  tokenExpires!: number;

  @ApiProperty({ example: 'admin' })
  login!: string;

  @ApiProperty({ example: ['ROLE_ADMIN'], type: [String] })
  roles!: string[];
}
