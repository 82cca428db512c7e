import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { AuthService } from './auth.service';
import {
  ApiOkResponse,
  ApiTags,
  ApiOperation,
  ApiBadRequestResponse,
  ApiUnprocessableEntityResponse,
} from '@nestjs/swagger';
import { AuthLoginDto } from './dto/auth-login.dto';
import { LoginResponseDto } from './dto/login-response.dto';

@ApiTags('Auth')
@Controller({
  path: 'auth',
  version: '1',
})
export class AuthController {
  constructor(private readonly service: AuthService) {}

  @Post('token')
  @ApiOperation({
    summary: 'Login/Password Token',
    description:
      'Authenticate with login and password. Returns a bearer token whose subject is the login.',
  })
  @ApiOkResponse({
    type: LoginResponseDto,
  })
  @ApiBadRequestResponse({
    description: 'Invalid request body or validation errors',
  })
  @ApiUnprocessableEntityResponse({
    description: 'Unknown login, incorrect password or disabled user',
  })
  @HttpCode(HttpStatus.OK)
  public login(@Body() loginDto: AuthLoginDto): Promise<LoginResponseDto> {
    return this.service.validateLogin(loginDto);
  }
}
