import { Test, TestingModule } from '@nestjs/testing';
import { EntityManager } from '@mikro-orm/core';
import { CatalogService } from '../catalog.service';
import { LegalPackage, PackageType } from '../../entities/legal-package.entity';

describe('CatalogService', () => {
  let service: CatalogService;

  const mockEntityManager = {
    find: jest.fn(),
    findOne: jest.fn(),
    create: jest.fn(),
    flush: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CatalogService,
        {
          provide: EntityManager,
          useValue: mockEntityManager,
        },
      ],
    }).compile();

    service = module.get<CatalogService>(CatalogService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('listActivePackages', () => {
    it('should query active packages ordered by sort order then name', async () => {
      mockEntityManager.find.mockResolvedValue([]);

      await service.listActivePackages();

      expect(mockEntityManager.find).toHaveBeenCalledWith(
        LegalPackage,
        { isActive: true },
        { orderBy: { sortOrder: 'asc', name: 'asc' } },
      );
    });
  });

  describe('findActiveById', () => {
    it('should only match active packages', async () => {
      mockEntityManager.findOne.mockResolvedValue(null);

      const result = await service.findActiveById('pkg-1');

      expect(result).toBeNull();
      expect(mockEntityManager.findOne).toHaveBeenCalledWith(LegalPackage, {
        id: 'pkg-1',
        isActive: true,
      });
    });
  });

  describe('seedDefaultPackages', () => {
    it('should create all four default packages on an empty catalog', async () => {
      mockEntityManager.find.mockResolvedValue([]);

      const created = await service.seedDefaultPackages();

      expect(created).toBe(4);
      expect(mockEntityManager.create).toHaveBeenCalledTimes(4);
      expect(mockEntityManager.create).toHaveBeenCalledWith(
        LegalPackage,
        expect.objectContaining({
          packageType: PackageType.EMPLOYMENT,
          slug: 'arbeidsrett',
          price: 180000,
        }),
      );
      expect(mockEntityManager.flush).toHaveBeenCalledTimes(1);
    });

    it('should skip package types that already exist', async () => {
      mockEntityManager.find.mockResolvedValue([
        { packageType: PackageType.LICENSING },
        { packageType: PackageType.HEALTH },
      ] as LegalPackage[]);

      const created = await service.seedDefaultPackages();

      expect(created).toBe(2);
      const createdTypes = mockEntityManager.create.mock.calls.map((call) => call[1].packageType);
      expect(createdTypes).toEqual([PackageType.EMPLOYMENT, PackageType.ADMINISTRATIVE]);
    });

    it('should not flush when nothing is missing', async () => {
      mockEntityManager.find.mockResolvedValue(
        Object.values(PackageType).map((packageType) => ({ packageType })),
      );

      const created = await service.seedDefaultPackages();

      expect(created).toBe(0);
      expect(mockEntityManager.flush).not.toHaveBeenCalled();
    });
  });
});
