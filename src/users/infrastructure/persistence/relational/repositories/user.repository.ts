import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { UserEntity } from '../entities/user.entity';
import {
  UserCreateData,
  UserRepository,
  UserUpdateData,
} from '../../user.repository';
import { User } from '../../../../domain/user';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class UsersRelationalRepository implements UserRepository {
  constructor(
    @InjectRepository(UserEntity)
    private readonly repository: Repository<UserEntity>,
  ) {}

  async findAll(): Promise<User[]> {
    const entities = await this.repository.find({ order: { id: 'ASC' } });
    return entities.map((entity) => this.toDomain(entity));
  }

  async findById(id: User['id']): Promise<NullableType<User>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? this.toDomain(entity) : null;
  }

  async findByLogin(login: User['login']): Promise<NullableType<User>> {
    const entity = await this.repository.findOne({ where: { login } });
    return entity ? this.toDomain(entity) : null;
  }

  async create(data: UserCreateData): Promise<User> {
    const entity = this.repository.create({
      login: data.login,
      password: data.password,
      enabled: data.enabled,
      roles: data.roles.map((role) => ({ id: role.id, name: role.name })),
    });
    const saved = await this.repository.save(entity);
    return this.toDomain(saved);
  }

  async update(
    id: User['id'],
    payload: UserUpdateData,
  ): Promise<NullableType<User>> {
    await this.repository.update(id, payload);
    return this.findById(id);
  }

  async remove(id: User['id']): Promise<void> {
    await this.repository.delete(id);
  }

  private toDomain(entity: UserEntity): User {
    return {
      id: entity.id,
      login: entity.login,
      password: entity.password,
      enabled: entity.enabled,
      // join rows carry no order; role id is creation order
      roles: [...entity.roles]
        .sort((a, b) => a.id - b.id)
        .map((role) => ({ id: role.id, name: role.name })),
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }
}
