import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { AclEntryEntity } from '../entities/acl-entry.entity';
import { AclObjectIdentityEntity } from '../entities/acl-object-identity.entity';
import { AclRepositoryPort } from '../../../../domain/repositories/acl.repository.port';
import { AclEntry } from '../../../../domain/entities/acl-entry.entity';
import { AclObjectIdentity } from '../../../../domain/entities/acl-object-identity.entity';
import { AclPermission } from '../../../../domain/acl-permission.enum';
import {
  AclObjectType,
  ObjectRef,
} from '../../../../domain/object-ref';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class AclRelationalRepository implements AclRepositoryPort {
  constructor(
    @InjectRepository(AclObjectIdentityEntity)
    private readonly identities: Repository<AclObjectIdentityEntity>,
    @InjectRepository(AclEntryEntity)
    private readonly entries: Repository<AclEntryEntity>,
  ) {}

  async findObjectIdentity(
    ref: ObjectRef,
  ): Promise<NullableType<AclObjectIdentity>> {
    const entity = await this.identities.findOne({
      where: { objectType: ref.type, objectId: ref.id },
    });

    return entity ? this.toIdentityDomain(entity) : null;
  }

  async createObjectIdentity(
    ref: ObjectRef,
    ownerLogin: string,
  ): Promise<AclObjectIdentity> {
    const entity = this.identities.create({
      objectType: ref.type,
      objectId: ref.id,
      ownerLogin,
    });

    const saved = await this.identities.save(entity);
    return this.toIdentityDomain(saved);
  }

  async deleteObjectIdentity(ref: ObjectRef): Promise<void> {
    await this.entries.delete({ objectType: ref.type, objectId: ref.id });
    await this.identities.delete({ objectType: ref.type, objectId: ref.id });
  }

  async findEntries(subjectLogin: string, ref: ObjectRef): Promise<AclEntry[]> {
    const entities = await this.entries.find({
      where: {
        subjectLogin,
        objectType: ref.type,
        objectId: ref.id,
      },
      order: { id: 'ASC' },
    });

    return entities.map((entity) => this.toEntryDomain(entity));
  }

  async createEntry(
    data: Omit<AclEntry, 'id' | 'createdAt'>,
  ): Promise<AclEntry> {
    const entity = this.entries.create({
      objectType: data.objectType,
      objectId: data.objectId,
      subjectLogin: data.subjectLogin,
      permission: data.permission,
    });

    const saved = await this.entries.save(entity);
    return this.toEntryDomain(saved);
  }

  async deleteEntry(
    subjectLogin: string,
    ref: ObjectRef,
    permission: AclPermission,
  ): Promise<void> {
    await this.entries.delete({
      subjectLogin,
      objectType: ref.type,
      objectId: ref.id,
      permission,
    });
  }

  async deleteEntriesForSubject(subjectLogin: string): Promise<void> {
    await this.entries.delete({ subjectLogin });
  }

  async findObjectIds(
    subjectLogin: string,
    objectType: AclObjectType,
    permission: AclPermission,
  ): Promise<number[]> {
    const entities = await this.entries.find({
      select: { objectId: true },
      where: { subjectLogin, objectType, permission },
    });

    return entities.map((entity) => entity.objectId);
  }

  private toIdentityDomain(entity: AclObjectIdentityEntity): AclObjectIdentity {
    return {
      id: entity.id,
      objectType: entity.objectType,
      objectId: entity.objectId,
      ownerLogin: entity.ownerLogin,
      createdAt: entity.createdAt,
    };
  }

  private toEntryDomain(entity: AclEntryEntity): AclEntry {
    return {
      id: entity.id,
      objectType: entity.objectType,
      objectId: entity.objectId,
      subjectLogin: entity.subjectLogin,
      permission: entity.permission,
      createdAt: entity.createdAt,
    };
  }
}
