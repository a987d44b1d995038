import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { LegalPackage } from '../entities/legal-package.entity';
import { formatMinorUnits } from '../../../common/utils/money.util';

export class PackageResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  slug!: string;

  @ApiProperty()
  name!: string;

  @ApiProperty()
  description!: string;

  @ApiProperty({ description: 'Price in minor currency units' })
  price!: number;

  @ApiProperty({ example: '1500.00' })
  formattedPrice!: string;

  @ApiProperty({ type: [String] })
  features!: string[];

  @ApiProperty()
  trialPeriodDays!: number;

  @ApiPropertyOptional()
  colorPrimary?: string;

  @ApiProperty()
  isFeatured!: boolean;

  static fromEntity(pkg: LegalPackage): PackageResponseDto {
    const dto = new PackageResponseDto();
    dto.id = pkg.id;
    dto.slug = pkg.slug;
    dto.name = pkg.name;
    dto.description = pkg.description;
    dto.price = pkg.price;
    dto.formattedPrice = formatMinorUnits(pkg.price);
    dto.features = pkg.features;
    dto.trialPeriodDays = pkg.trialPeriodDays;
    dto.colorPrimary = pkg.colorPrimary;
    dto.isFeatured = pkg.isFeatured;
    return dto;
  }
}
