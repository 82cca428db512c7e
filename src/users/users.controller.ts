import {
  Controller,
  Get,
  Post,
  Body,
  Patch,
  Param,
  Delete,
  UseGuards,
  Request,
  HttpStatus,
  HttpCode,
  ParseIntPipe,
} from '@nestjs/common';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import { UserResponseDto } from './dto/user-response.dto';
import {
  ApiBearerAuth,
  ApiCreatedResponse,
  ApiOkResponse,
  ApiParam,
  ApiTags,
  ApiOperation,
  ApiBadRequestResponse,
  ApiUnauthorizedResponse,
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiUnprocessableEntityResponse,
  ApiNoContentResponse,
} from '@nestjs/swagger';
import { AuthGuard } from '@nestjs/passport';
import { UsersService } from './users.service';
import {
  AuthenticatedRequest,
  extractActorFromRequest,
} from '../auth/utils/actor-extractor.util';

@ApiBearerAuth()
@UseGuards(AuthGuard('jwt'))
@ApiTags('Users')
@Controller({
  path: 'users',
  version: '1',
})
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Post()
  @ApiOperation({
    summary: 'Create User',
    description:
      'Create a user. ROLE_ADMIN holders may grant any non-admin role; ' +
      'LOCAL_ADMIN holders are limited by the tenant rules.',
  })
  @ApiCreatedResponse({
    type: UserResponseDto,
    description: 'User created successfully',
  })
  @ApiBadRequestResponse({
    description: 'Invalid request body or validation errors',
  })
  @ApiUnauthorizedResponse({
    description: 'Invalid or expired access token',
  })
  @ApiForbiddenResponse({
    description: 'The actor may not create a user with these roles',
  })
  @ApiUnprocessableEntityResponse({
    description: 'Weak password or login already exists',
  })
  @HttpCode(HttpStatus.CREATED)
  create(
    @Request() req: AuthenticatedRequest,
    @Body() createUserDto: CreateUserDto,
  ): Promise<UserResponseDto> {
    return this.usersService.create(
      createUserDto,
      extractActorFromRequest(req),
    );
  }

  @Get()
  @ApiOperation({
    summary: 'List Users',
    description: 'Users the caller holds a READ permission on (all for admins).',
  })
  @ApiOkResponse({
    type: [UserResponseDto],
  })
  @ApiUnauthorizedResponse({
    description: 'Invalid or expired access token',
  })
  @HttpCode(HttpStatus.OK)
  findAll(@Request() req: AuthenticatedRequest): Promise<UserResponseDto[]> {
    return this.usersService.findAll(extractActorFromRequest(req));
  }

  @Get('me')
  @ApiOperation({
    summary: 'Current User',
  })
  @ApiOkResponse({
    type: UserResponseDto,
  })
  @ApiUnauthorizedResponse({
    description: 'Invalid or expired access token',
  })
  @HttpCode(HttpStatus.OK)
  me(@Request() req: AuthenticatedRequest): Promise<UserResponseDto> {
    return this.usersService.me(extractActorFromRequest(req));
  }

  @Get(':id')
  @ApiOperation({
    summary: 'Get User by ID',
  })
  @ApiOkResponse({
    type: UserResponseDto,
  })
  @ApiParam({
    name: 'id',
    type: Number,
    required: true,
    example: 42,
  })
  @ApiUnauthorizedResponse({
    description: 'Invalid or expired access token',
  })
  @ApiNotFoundResponse({
    description: 'User not found or not readable by the caller',
  })
  @HttpCode(HttpStatus.OK)
  findOne(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<UserResponseDto> {
    return this.usersService.findById(id, extractActorFromRequest(req));
  }

  @Patch(':id')
  @ApiOperation({
    summary: 'Change User Password',
  })
  @ApiOkResponse({
    type: UserResponseDto,
  })
  @ApiParam({
    name: 'id',
    type: Number,
    required: true,
    example: 42,
  })
  @ApiBadRequestResponse({
    description: 'Invalid request body or the user is disabled',
  })
  @ApiUnauthorizedResponse({
    description: 'Invalid or expired access token',
  })
  @ApiForbiddenResponse({
    description: 'No WRITE permission on this user',
  })
  @ApiUnprocessableEntityResponse({
    description: 'Weak password',
  })
  @HttpCode(HttpStatus.OK)
  update(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
    @Body() updateUserDto: UpdateUserDto,
  ): Promise<UserResponseDto> {
    return this.usersService.update(
      id,
      updateUserDto,
      extractActorFromRequest(req),
    );
  }

  @Post(':id/disable')
  @ApiOperation({
    summary: 'Disable User',
    description: 'Administrators can not be disabled.',
  })
  @ApiNoContentResponse({
    description: 'User disabled',
  })
  @ApiParam({
    name: 'id',
    type: Number,
    required: true,
    example: 42,
  })
  @ApiUnauthorizedResponse({
    description: 'Invalid or expired access token',
  })
  @ApiForbiddenResponse({
    description: 'No WRITE permission on this user, or the user is an admin',
  })
  @HttpCode(HttpStatus.NO_CONTENT)
  disable(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<void> {
    return this.usersService.disable(id, extractActorFromRequest(req));
  }

  @Delete(':id')
  @ApiOperation({
    summary: 'Delete User',
    description: 'Administrators can not be deleted.',
  })
  @ApiNoContentResponse({
    description: 'User deleted successfully',
  })
  @ApiParam({
    name: 'id',
    type: Number,
    required: true,
    example: 42,
  })
  @ApiUnauthorizedResponse({
    description: 'Invalid or expired access token',
  })
  @ApiForbiddenResponse({
    description: 'No WRITE permission on this user, or the user is an admin',
  })
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<void> {
    return this.usersService.remove(id, extractActorFromRequest(req));
  }
}
