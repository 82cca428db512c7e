import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { AclObjectType } from '../../../../domain/object-ref';

@Entity({
  name: 'acl_object_identities',
})
@Index('IDX_acl_object_identities_object', ['objectType', 'objectId'], {
  unique: true,
})
export class AclObjectIdentityEntity extends EntityRelationalHelper {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'object_type', type: 'varchar', length: 50 })
  objectType!: AclObjectType;

  @Column({ name: 'object_id', type: 'integer' })
  objectId!: number;

  @Column({ name: 'owner_login', type: 'varchar', length: 100 })
  @Index('IDX_acl_object_identities_owner_login')
  ownerLogin!: string;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}
