import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsOptional, IsString, IsUUID, Max, MaxLength, Min } from 'class-validator';
import { ShoppingCart } from '../entities/shopping-cart.entity';
import { itemCount, toCartLines, totalPrice } from '../domain/cart-totals';
import { formatMinorUnits } from '../../../common/utils/money.util';

export class AddToCartDto {
  @ApiProperty()
  @IsUUID()
  packageId!: string;

  @ApiPropertyOptional({ default: 1, minimum: 1, maximum: 10 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(10)
  quantity?: number;
}

export class ApplyCouponDto {
  @ApiProperty({ example: 'TEST10' })
  @IsString()
  @MaxLength(50)
  code!: string;
}

export class CartItemResponseDto {
  @ApiProperty()
  packageId!: string;

  @ApiProperty()
  packageName!: string;

  @ApiProperty()
  packageSlug!: string;

  @ApiProperty()
  quantity!: number;

  @ApiProperty({ description: 'Unit price snapshot in minor units' })
  price!: number;

  @ApiProperty({ example: '1500.00' })
  formattedPrice!: string;

  @ApiProperty()
  lineTotal!: number;
}

export class CartResponseDto {
  @ApiPropertyOptional({ description: 'Anonymous cart key to send back in X-Cart-Session' })
  sessionKey?: string;

  @ApiProperty({ type: [CartItemResponseDto] })
  items!: CartItemResponseDto[];

  @ApiProperty()
  itemCount!: number;

  @ApiProperty()
  total!: number;

  @ApiProperty({ example: '2500.00' })
  formattedTotal!: string;

  static fromEntity(cart: ShoppingCart | null, sessionKey?: string): CartResponseDto {
    const items = cart ? cart.items.getItems() : [];
    const lines = toCartLines(items);

    const dto = new CartResponseDto();
    dto.sessionKey = sessionKey;
    dto.items = items.map((item) => ({
      packageId: item.package.id,
      packageName: item.package.name,
      packageSlug: item.package.slug,
      quantity: item.quantity,
      price: item.price,
      formattedPrice: formatMinorUnits(item.price),
      lineTotal: item.price * item.quantity,
    }));
    dto.itemCount = itemCount(lines);
    dto.total = totalPrice(lines);
    dto.formattedTotal = formatMinorUnits(dto.total);
    return dto;
  }
}

export class CouponPreviewDto {
  @ApiProperty()
  code!: string;

  @ApiProperty()
  subtotal!: number;

  @ApiProperty()
  discountAmount!: number;

  @ApiProperty({ description: 'Tax on the discounted amount, as charged at checkout' })
  taxAmount!: number;

  @ApiProperty()
  total!: number;

  @ApiProperty({ example: '250.00' })
  formattedDiscount!: string;

  @ApiProperty({ example: '2250.00' })
  formattedTotal!: string;
}
