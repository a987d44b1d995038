import { Controller, Get, Header, NotFoundException, Param } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CatalogService } from '../services/catalog.service';
import { PackageResponseDto } from '../dto/package-response.dto';

@ApiTags('catalog')
@Controller('packages')
export class CatalogController {
  constructor(private readonly catalogService: CatalogService) {}

  @Get()
  @Header('Cache-Control', 'public, max-age=300')
  @ApiOperation({ summary: 'List active legal packages' })
  @ApiResponse({ status: 200, type: [PackageResponseDto] })
  async list(): Promise<PackageResponseDto[]> {
    const packages = await this.catalogService.listActivePackages();
    return packages.map((pkg) => PackageResponseDto.fromEntity(pkg));
  }

  @Get(':slug')
  @Header('Cache-Control', 'public, max-age=300')
  @ApiOperation({ summary: 'Get an active legal package by slug' })
  @ApiResponse({ status: 200, type: PackageResponseDto })
  @ApiResponse({ status: 404, description: 'Package not found' })
  async findOne(@Param('slug') slug: string): Promise<PackageResponseDto> {
    const pkg = await this.catalogService.findBySlug(slug);
    if (!pkg) {
      throw new NotFoundException('Package not found');
    }
    return PackageResponseDto.fromEntity(pkg);
  }
}
