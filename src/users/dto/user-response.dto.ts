import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { AclPermission } from '../../access-control/domain/acl-permission.enum';

export class UserResponseDto {
  @ApiProperty({ example: 42 })
  id!: number;

  @ApiProperty({ example: 'jane.doe' })
  login!: string;

  @ApiProperty({ example: true })
  enabled!: boolean;

  @ApiProperty({ example: ['ROLE_ACME_LOCAL_USER'], type: [String] })
  roles!: string[];

  @ApiProperty({ type: Date })
  createdAt!: Date;

  @ApiProperty({ type: Date })
  updatedAt!: Date;

  @ApiPropertyOptional({
    example: 'admin',
    nullable: true,
    description: 'Login of the ACL owner (the user who created this one)',
  })
  owner?: string | null;

  @ApiPropertyOptional({
    enum: AclPermission,
    isArray: true,
    example: [AclPermission.READ, AclPermission.WRITE],
    description: "The caller's own permissions on this user",
  })
  acls?: AclPermission[];
}
