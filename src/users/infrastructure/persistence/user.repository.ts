import { NullableType } from '../../../utils/types/nullable.type';
import { User } from '../../domain/user';

export type UserCreateData = Omit<User, 'id' | 'createdAt' | 'updatedAt'>;

export type UserUpdateData = Partial<Pick<User, 'password' | 'enabled'>>;

export abstract class UserRepository {
  abstract findAll(): Promise<User[]>;

  abstract findById(id: User['id']): Promise<NullableType<User>>;

  abstract findByLogin(login: User['login']): Promise<NullableType<User>>;

  abstract create(data: UserCreateData): Promise<User>;

  /**
   * Role membership is fixed at creation and not updated here.
   */
  abstract update(
    id: User['id'],
    payload: UserUpdateData,
  ): Promise<NullableType<User>>;

  abstract remove(id: User['id']): Promise<void>;
}
