import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Request,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBadRequestResponse,
  ApiBearerAuth,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiNoContentResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
  ApiUnauthorizedResponse,
  ApiUnprocessableEntityResponse,
} from '@nestjs/swagger';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import { RolesGuard } from '../roles/roles.guard';
import { CompaniesService } from './companies.service';
import { CreateCompanyDto } from './dto/create-company.dto';
import { UpdateCompanyDto } from './dto/update-company.dto';
import { CompanyResponseDto } from './dto/company-response.dto';
import { Company } from './domain/company';
import {
  AuthenticatedRequest,
  extractActorFromRequest,
} from '../auth/utils/actor-extractor.util';

@ApiBearerAuth()
@Roles(RoleEnum.admin)
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiTags('Companies')
@ApiUnauthorizedResponse({
  description: 'Invalid or expired access token',
})
@ApiForbiddenResponse({
  description: 'Insufficient permissions. Admin role required.',
})
@Controller({
  path: 'companies',
  version: '1',
})
export class CompaniesController {
  constructor(private readonly companiesService: CompaniesService) {}

  @Post()
  @ApiOperation({
    summary: 'Provision Company (Admin Only)',
    description:
      'Create a tenant together with its ROLE_<ALIAS>_LOCAL_ADMIN and ' +
      'ROLE_<ALIAS>_LOCAL_USER roles.',
  })
  @ApiCreatedResponse({
    type: CompanyResponseDto,
  })
  @ApiBadRequestResponse({
    description: 'Invalid request body or validation errors',
  })
  @ApiUnprocessableEntityResponse({
    description: 'Role alias already exists',
  })
  @HttpCode(HttpStatus.CREATED)
  create(
    @Request() req: AuthenticatedRequest,
    @Body() dto: CreateCompanyDto,
  ): Promise<Company> {
    return this.companiesService.provision(dto, extractActorFromRequest(req));
  }

  @Get()
  @ApiOperation({
    summary: 'List Companies (Admin Only)',
  })
  @ApiOkResponse({
    type: [CompanyResponseDto],
  })
  @HttpCode(HttpStatus.OK)
  findAll(): Promise<Company[]> {
    return this.companiesService.findAll();
  }

  @Get(':id')
  @ApiOperation({
    summary: 'Get Company by ID (Admin Only)',
  })
  @ApiOkResponse({
    type: CompanyResponseDto,
  })
  @ApiParam({
    name: 'id',
    type: Number,
    required: true,
    example: 7,
  })
  @ApiNotFoundResponse({
    description: 'Company not found',
  })
  @HttpCode(HttpStatus.OK)
  findOne(@Param('id', ParseIntPipe) id: number): Promise<Company> {
    return this.companiesService.findById(id);
  }

  @Patch(':id')
  @ApiOperation({
    summary: 'Update Company (Admin Only)',
    description: 'Only the name can change; the role alias is immutable.',
  })
  @ApiOkResponse({
    type: CompanyResponseDto,
  })
  @ApiParam({
    name: 'id',
    type: Number,
    required: true,
    example: 7,
  })
  @ApiNotFoundResponse({
    description: 'Company not found',
  })
  @ApiUnprocessableEntityResponse({
    description: 'Attempt to change the role alias',
  })
  @HttpCode(HttpStatus.OK)
  update(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateCompanyDto,
  ): Promise<Company> {
    return this.companiesService.update(id, dto, extractActorFromRequest(req));
  }

  @Delete(':id')
  @ApiOperation({
    summary: 'Delete Company (Admin Only)',
  })
  @ApiNoContentResponse({
    description: 'Company deleted',
  })
  @ApiParam({
    name: 'id',
    type: Number,
    required: true,
    example: 7,
  })
  @ApiNotFoundResponse({
    description: 'Company not found',
  })
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<void> {
    return this.companiesService.delete(id, extractActorFromRequest(req));
  }
}
