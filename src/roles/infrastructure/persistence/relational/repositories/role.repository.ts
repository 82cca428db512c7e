import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { RoleEntity } from '../entities/role.entity';
import { RoleRepositoryPort } from '../../../../domain/repositories/role.repository.port';
import { Role } from '../../../../domain/role';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class RoleRelationalRepository implements RoleRepositoryPort {
  constructor(
    @InjectRepository(RoleEntity)
    private readonly repository: Repository<RoleEntity>,
  ) {}

  async findAll(): Promise<Role[]> {
    const entities = await this.repository.find({ order: { id: 'ASC' } });
    return entities.map((entity) => this.toDomain(entity));
  }

  async findByName(name: string): Promise<NullableType<Role>> {
    const entity = await this.repository.findOne({ where: { name } });
    return entity ? this.toDomain(entity) : null;
  }

  async findByNames(names: string[]): Promise<Role[]> {
    if (names.length === 0) {
      return [];
    }
    const entities = await this.repository.find({
      where: { name: In(names) },
    });
    return entities.map((entity) => this.toDomain(entity));
  }

  async createMany(names: string[]): Promise<Role[]> {
    const entities = names.map((name) => this.repository.create({ name }));
    const saved = await this.repository.save(entities);
    return saved.map((entity) => this.toDomain(entity));
  }

  private toDomain(entity: RoleEntity): Role {
    return {
      id: entity.id,
      name: entity.name,
    };
  }
}
