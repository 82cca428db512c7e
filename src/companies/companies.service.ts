import {
  HttpStatus,
  Injectable,
  Logger,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { CompanyRepositoryPort } from './domain/repositories/company.repository.port';
import { Company } from './domain/company';
import {
  buildCompanyCandidate,
  normalizeRoleAlias,
} from './domain/company-candidate';
import { ImmutableFieldViolationException } from './domain/errors/immutable-field-violation.exception';
import { CreateCompanyDto } from './dto/create-company.dto';
import { UpdateCompanyDto } from './dto/update-company.dto';
import { UnitOfWork } from '../database/unit-of-work/unit-of-work';
import { TransactionRequiredException } from '../database/unit-of-work/transaction-required.exception';
import { tenantRoleNames } from '../roles/domain/role-name';
import { Actor } from '../authorization/domain/actor';
import { AuditService, AuditEventType } from '../audit/audit.service';
import { isUniqueViolation } from '../database/utils/is-unique-violation';

function roleAliasAlreadyExists(): UnprocessableEntityException {
  return new UnprocessableEntityException({
    status: HttpStatus.UNPROCESSABLE_ENTITY,
    errors: {
      roleAlias: 'alreadyExists',
    },
  });
}

/**
 * CompaniesService
 *
 * Tenant provisioning. A company and its LOCAL_ADMIN / LOCAL_USER roles
 * are written in one unit of work: both exist after provisioning, or
 * neither does.
 */
@Injectable()
export class CompaniesService {
  private readonly logger = new Logger(CompaniesService.name);

  constructor(
    private readonly companyRepository: CompanyRepositoryPort,
    private readonly unitOfWork: UnitOfWork,
    private readonly auditService: AuditService,
  ) {}

  findAll(): Promise<Company[]> {
    return this.companyRepository.findAll();
  }

  async findById(id: number): Promise<Company> {
    const company = await this.companyRepository.findById(id);
    if (!company) {
      throw new NotFoundException(`Company with id = ${id} does not exist!`);
    }
    return company;
  }

  /**
   * @throws BadRequestException on field-level errors
   * @throws TransactionRequiredException when the store cannot commit the
   * company and its roles together
   * @throws UnprocessableEntityException when the alias or one of its role
   * names is taken
   */
  async provision(dto: CreateCompanyDto, actor: Actor): Promise<Company> {
    const candidate = buildCompanyCandidate(dto);

    if (!this.unitOfWork.transactional) {
      throw new TransactionRequiredException('Company provisioning');
    }

    const roleNames = tenantRoleNames(candidate.roleAlias);

    let company: Company;
    try {
      company = await this.unitOfWork.run(async ({ companies, roles }) => {
        const existing = await companies.findByRoleAlias(candidate.roleAlias);
        const clashingRoles = await roles.findByNames(roleNames);
        if (existing || clashingRoles.length > 0) {
          throw roleAliasAlreadyExists();
        }

        const saved = await companies.create({
          name: candidate.name,
          roleAlias: candidate.roleAlias,
        });
        await roles.createMany(roleNames);
        return saved;
      });
    } catch (error) {
      // the alias or a role name was inserted concurrently after the check
      if (isUniqueViolation(error)) {
        throw roleAliasAlreadyExists();
      }
      throw error;
    }

    this.logger.log(
      `[PROVISION COMPANY] id=${company.id} alias=${company.roleAlias} roles=${roleNames.join(',')}`,
    );
    this.auditService.logEvent({
      actor: actor.login,
      component: 'companies',
      event: AuditEventType.COMPANY_PROVISIONED,
      target: `company#${company.id}`,
      success: true,
      metadata: { roleAlias: company.roleAlias, roles: roleNames },
    });

    return company;
  }

  /**
   * Only the name can change. An alias in the payload must equal the
   * stored one (case-insensitive).
   *
   * @throws ImmutableFieldViolationException when the alias differs or is
   * null
   */
  async update(id: number, dto: UpdateCompanyDto, actor: Actor): Promise<Company> {
    const existing = await this.findById(id);

    // null asks to clear the alias, which is a change like any other
    if (
      dto.roleAlias !== undefined &&
      (dto.roleAlias === null ||
        normalizeRoleAlias(dto.roleAlias) !== existing.roleAlias)
    ) {
      this.auditService.logEvent({
        actor: actor.login,
        component: 'companies',
        event: AuditEventType.COMPANY_UPDATED,
        target: `company#${id}`,
        success: false,
        errorMessage: 'roleAlias is immutable',
      });
      throw new ImmutableFieldViolationException(
        'roleAlias',
        'You can not change Role Alias of the company',
      );
    }

    const candidate = buildCompanyCandidate({
      name: dto.name ?? existing.name,
      roleAlias: existing.roleAlias,
    });

    const updated = await this.companyRepository.update(id, {
      name: candidate.name,
    });
    if (!updated) {
      throw new NotFoundException(`Company with id = ${id} does not exist!`);
    }

    this.auditService.logEvent({
      actor: actor.login,
      component: 'companies',
      event: AuditEventType.COMPANY_UPDATED,
      target: `company#${id}`,
      success: true,
    });

    return updated;
  }

  /**
   * Tenant roles are left in place.
   */
  async delete(id: number, actor: Actor): Promise<void> {
    const company = await this.findById(id);
    await this.companyRepository.delete(company.id);

    this.logger.log(`[DELETE COMPANY] id=${id} alias=${company.roleAlias}`);
    this.auditService.logEvent({
      actor: actor.login,
      component: 'companies',
      event: AuditEventType.COMPANY_DELETED,
      target: `company#${id}`,
      success: true,
    });
  }
}
