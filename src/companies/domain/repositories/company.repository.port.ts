import { Company } from '../company';
import { NullableType } from '../../../utils/types/nullable.type';

export type CompanyWriteData = Pick<Company, 'name' | 'roleAlias'>;

export abstract class CompanyRepositoryPort {
  abstract findAll(): Promise<Company[]>;

  abstract findById(id: number): Promise<NullableType<Company>>;

  abstract findByRoleAlias(roleAlias: string): Promise<NullableType<Company>>;

  abstract create(data: CompanyWriteData): Promise<Company>;

  abstract update(
    id: number,
    data: Pick<Company, 'name'>,
  ): Promise<NullableType<Company>>;

  abstract delete(id: number): Promise<void>;
}
