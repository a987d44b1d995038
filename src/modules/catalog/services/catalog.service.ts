import { Injectable, Logger } from '@nestjs/common';
import { EntityManager } from '@mikro-orm/core';
import { LegalPackage, PackageType } from '../entities/legal-package.entity';
import defaultPackages from '../data/default-packages.json';

const PACKAGE_TYPES: ReadonlySet<string> = new Set(Object.values(PackageType));

function isPackageType(value: string): value is PackageType {
  return PACKAGE_TYPES.has(value);
}

@Injectable()
export class CatalogService {
  private readonly logger = new Logger(CatalogService.name);

  constructor(private readonly em: EntityManager) {}

  async listActivePackages(): Promise<LegalPackage[]> {
    return this.em.find(
      LegalPackage,
      { isActive: true },
      { orderBy: { sortOrder: 'asc', name: 'asc' } },
    );
  }

  async findActiveById(id: string): Promise<LegalPackage | null> {
    return this.em.findOne(LegalPackage, { id, isActive: true });
  }

  async findBySlug(slug: string): Promise<LegalPackage | null> {
    return this.em.findOne(LegalPackage, { slug, isActive: true });
  }

  /**
   * Creates the default packages that are missing, matched by type.
   * Returns the number of packages created.
   */
  async seedDefaultPackages(): Promise<number> {
    const existing = await this.em.find(LegalPackage, {});
    const present = new Set(existing.map((pkg) => pkg.packageType));
    let created = 0;

    for (const data of defaultPackages) {
      if (!isPackageType(data.packageType)) {
        this.logger.warn(`Skipping default package with unknown type ${data.packageType}`);
        continue;
      }
      if (present.has(data.packageType)) {
        continue;
      }

      this.em.create(LegalPackage, { ...data, packageType: data.packageType });
      created++;
    }

    if (created > 0) {
      await this.em.flush();
      this.logger.log(`Seeded ${created} default legal packages`);
    }

    return created;
  }
}
