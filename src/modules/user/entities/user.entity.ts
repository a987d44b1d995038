import { Entity, Enum, Property } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';

export enum UserRole {
  CLIENT = 'client',
  LAWYER = 'lawyer',
  ADMIN = 'admin',
}

@Entity({ tableName: 'app_user' })
export class User extends BaseEntity<'role' | 'isActive'> {
  @Property({ type: 'string', unique: true })
  email!: string;

  @Property({ type: 'string', nullable: true, hidden: true })
  password?: string;

  @Property({ type: 'string', nullable: true })
  firstName?: string;

  @Property({ type: 'string', nullable: true })
  lastName?: string;

  @Property({ type: 'string', nullable: true })
  organization?: string;

  @Property({ type: 'string', length: 20, nullable: true })
  phone?: string;

  @Enum(() => UserRole)
  role: UserRole = UserRole.CLIENT;

  @Property({ type: 'boolean' })
  isActive: boolean = true;

  @Property({ type: 'datetime', nullable: true })
  lastLoginAt?: Date;

  @Property({ type: 'string', nullable: true })
  stripeCustomerId?: string;
}
