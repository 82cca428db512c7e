import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { CompanyEntity } from '../entities/company.entity';
import {
  CompanyRepositoryPort,
  CompanyWriteData,
} from '../../../../domain/repositories/company.repository.port';
import { Company } from '../../../../domain/company';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class CompanyRelationalRepository implements CompanyRepositoryPort {
  constructor(
    @InjectRepository(CompanyEntity)
    private readonly repository: Repository<CompanyEntity>,
  ) {}

  async findAll(): Promise<Company[]> {
    const entities = await this.repository.find({ order: { id: 'ASC' } });
    return entities.map((entity) => this.toDomain(entity));
  }

  async findById(id: number): Promise<NullableType<Company>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? this.toDomain(entity) : null;
  }

  async findByRoleAlias(roleAlias: string): Promise<NullableType<Company>> {
    const entity = await this.repository.findOne({ where: { roleAlias } });
    return entity ? this.toDomain(entity) : null;
  }

  async create(data: CompanyWriteData): Promise<Company> {
    const entity = this.repository.create({
      name: data.name,
      roleAlias: data.roleAlias,
    });
    const saved = await this.repository.save(entity);
    return this.toDomain(saved);
  }

  async update(
    id: number,
    data: Pick<Company, 'name'>,
  ): Promise<NullableType<Company>> {
    await this.repository.update(id, { name: data.name });
    return this.findById(id);
  }

  async delete(id: number): Promise<void> {
    await this.repository.delete(id);
  }

  private toDomain(entity: CompanyEntity): Company {
    return {
      id: entity.id,
      name: entity.name,
      roleAlias: entity.roleAlias,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }
}
