import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { AclObjectType } from '../../../../domain/object-ref';
import { AclPermission } from '../../../../domain/acl-permission.enum';

@Entity({
  name: 'acl_entries',
})
@Index(
  'IDX_acl_entries_object_subject_permission',
  ['objectType', 'objectId', 'subjectLogin', 'permission'],
  { unique: true },
)
export class AclEntryEntity extends EntityRelationalHelper {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'object_type', type: 'varchar', length: 50 })
  objectType!: AclObjectType;

  @Column({ name: 'object_id', type: 'integer' })
  objectId!: number;

  @Column({ name: 'subject_login', type: 'varchar', length: 100 })
  @Index('IDX_acl_entries_subject_login')
  subjectLogin!: string;

  @Column({ type: 'varchar', length: 10 })
  permission!: AclPermission;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}
