import { Entity, Enum, Property } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';

export enum PackageType {
  LICENSING = 'bevillingsforvaltning',
  EMPLOYMENT = 'arbeidsrett',
  ADMINISTRATIVE = 'forvaltningsrett',
  HEALTH = 'helse',
}

@Entity({ tableName: 'legal_package' })
export class LegalPackage extends BaseEntity<
  'trialPeriodDays' | 'features' | 'isActive' | 'isFeatured' | 'sortOrder'
> {
  @Property({ type: 'string', length: 100, unique: true })
  slug!: string;

  @Property({ type: 'string', length: 200 })
  name!: string;

  @Enum({ items: () => PackageType, unique: true })
  packageType!: PackageType;

  @Property({ type: 'text' })
  description!: string;

  /** Price in minor currency units. */
  @Property({ type: 'integer' })
  price!: number;

  @Property({ type: 'integer' })
  trialPeriodDays: number = 7;

  @Property({ type: 'json' })
  features: string[] = [];

  @Property({ type: 'string', length: 7, nullable: true })
  colorPrimary?: string;

  @Property({ type: 'boolean' })
  isActive: boolean = true;

  @Property({ type: 'boolean' })
  isFeatured: boolean = false;

  @Property({ type: 'integer' })
  sortOrder: number = 0;
}
