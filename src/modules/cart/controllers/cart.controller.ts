import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Delete,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  ParseUUIDPipe,
  Post,
  Res,
  UseGuards,
} from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ConfigService } from '@nestjs/config';
import { Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { CartOwner, CartService } from '../services/cart.service';
import { AddToCartDto, ApplyCouponDto, CartResponseDto, CouponPreviewDto } from '../dto/cart.dto';
import { toCartLines } from '../domain/cart-totals';
import { OptionalJwtAuthGuard } from '../../auth/guards/optional-jwt-auth.guard';
import { CurrentUser } from '../../auth/decorators/current-user.decorator';
import { User } from '../../user/entities/user.entity';
import { CouponService } from '../../coupon/services/coupon.service';
import { computeOrderTotals, parseTaxRate } from '../../order/domain/order-totals';
import { formatMinorUnits } from '../../../common/utils/money.util';

export const CART_SESSION_HEADER = 'x-cart-session';

@ApiTags('cart')
@ApiHeader({ name: 'X-Cart-Session', required: false, description: 'Anonymous cart key' })
@UseGuards(OptionalJwtAuthGuard)
@Controller('cart')
export class CartController {
  constructor(
    private readonly cartService: CartService,
    private readonly couponService: CouponService,
    private readonly configService: ConfigService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Get the current cart' })
  @ApiResponse({ status: 200, type: CartResponseDto })
  async getCart(
    @CurrentUser() user: User | undefined,
    @Headers(CART_SESSION_HEADER) sessionKey?: string,
  ): Promise<CartResponseDto> {
    const owner = await this.cartService.resolveOwner(user?.id, sessionKey);
    const cart = owner ? await this.cartService.getCart(owner) : null;
    return CartResponseDto.fromEntity(cart, sessionKeyOf(owner));
  }

  @Get('count')
  @ApiOperation({ summary: 'Number of distinct packages in the cart' })
  async count(
    @CurrentUser() user: User | undefined,
    @Headers(CART_SESSION_HEADER) sessionKey?: string,
  ): Promise<{ count: number }> {
    const cart = await this.getCart(user, sessionKey);
    return { count: cart.itemCount };
  }

  @Post('items')
  @ApiOperation({ summary: 'Add a package to the cart' })
  @ApiResponse({ status: 201, type: CartResponseDto })
  @ApiResponse({ status: 404, description: 'Package not found or inactive' })
  @ApiResponse({ status: 409, description: 'The user already has access to the package' })
  async addItem(
    @CurrentUser() user: User | undefined,
    @Body() dto: AddToCartDto,
    @Res({ passthrough: true }) response: Response,
    @Headers(CART_SESSION_HEADER) sessionKey?: string,
  ): Promise<CartResponseDto> {
    let owner = await this.cartService.resolveOwner(user?.id, sessionKey);
    if (!owner) {
      owner = { kind: 'session', sessionKey: uuidv4() };
      response.setHeader('X-Cart-Session', owner.sessionKey);
    }

    const result = await this.cartService.addPackage(owner, dto.packageId, dto.quantity ?? 1);
    if (!result.added) {
      if (result.reason === 'already_owned') {
        throw new ConflictException(result.message);
      }
      throw new NotFoundException(result.message);
    }

    return CartResponseDto.fromEntity(result.cart, sessionKeyOf(owner));
  }

  @Delete('items/:packageId')
  @ApiOperation({ summary: 'Remove a package from the cart' })
  @ApiResponse({ status: 200, type: CartResponseDto })
  async removeItem(
    @CurrentUser() user: User | undefined,
    @Param('packageId', ParseUUIDPipe) packageId: string,
    @Headers(CART_SESSION_HEADER) sessionKey?: string,
  ): Promise<CartResponseDto> {
    const owner = await this.cartService.resolveOwner(user?.id, sessionKey);
    const cart = owner ? await this.cartService.removePackage(owner, packageId) : null;
    return CartResponseDto.fromEntity(cart, sessionKeyOf(owner));
  }

  @Post('coupon')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Preview a coupon against the cart without redeeming it' })
  @ApiResponse({ status: 200, type: CouponPreviewDto })
  @ApiResponse({ status: 400, description: 'Empty cart or coupon rejected' })
  async previewCoupon(
    @CurrentUser() user: User | undefined,
    @Body() dto: ApplyCouponDto,
    @Headers(CART_SESSION_HEADER) sessionKey?: string,
  ): Promise<CouponPreviewDto> {
    const owner = await this.cartService.resolveOwner(user?.id, sessionKey);
    const cart = owner ? await this.cartService.getCart(owner) : null;
    const lines = cart ? toCartLines(cart.items.getItems()) : [];
    if (lines.length === 0) {
      throw new BadRequestException('Your cart is empty.');
    }

    const validation = await this.couponService.validateForCart(dto.code, lines, user?.id);
    if (!validation.valid) {
      throw new BadRequestException(validation.message);
    }

    const totals = computeOrderTotals(
      lines,
      validation.discountAmount,
      parseTaxRate(this.configService.get('ORDER_TAX_RATE', 0)),
    );
    return {
      code: validation.coupon.code,
      subtotal: totals.totalAmount,
      discountAmount: totals.discountAmount,
      taxAmount: totals.taxAmount,
      total: totals.finalAmount,
      formattedDiscount: formatMinorUnits(totals.discountAmount),
      formattedTotal: formatMinorUnits(totals.finalAmount),
    };
  }
}

function sessionKeyOf(owner: CartOwner | null): string | undefined {
  return owner?.kind === 'session' ? owner.sessionKey : undefined;
}
