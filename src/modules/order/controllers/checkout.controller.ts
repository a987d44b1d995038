import { Body, Controller, Headers, Post, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CheckoutService } from '../services/checkout.service';
import { CheckoutDto, CheckoutResponseDto } from '../dto/checkout.dto';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { CurrentUser } from '../../auth/decorators/current-user.decorator';
import { User } from '../../user/entities/user.entity';
import { CartService } from '../../cart/services/cart.service';
import { CART_SESSION_HEADER } from '../../cart/controllers/cart.controller';

@ApiTags('checkout')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard)
@Controller('checkout')
export class CheckoutController {
  constructor(
    private readonly checkoutService: CheckoutService,
    private readonly cartService: CartService,
  ) {}

  @Post()
  @ApiOperation({ summary: 'Create an order from the cart and start the payment' })
  @ApiHeader({ name: 'X-Cart-Session', required: false, description: 'Anonymous cart to merge before checkout' })
  @ApiResponse({ status: 201, type: CheckoutResponseDto })
  @ApiResponse({ status: 400, description: 'Empty cart, invalid coupon or zero total' })
  @ApiResponse({ status: 409, description: 'Cart prices changed; the cart was refreshed' })
  async checkout(
    @CurrentUser() user: User,
    @Body() dto: CheckoutDto,
    @Headers(CART_SESSION_HEADER) sessionKey?: string,
  ): Promise<CheckoutResponseDto> {
    await this.cartService.resolveOwner(user.id, sessionKey);

    const result = await this.checkoutService.checkout(
      user,
      {
        email: dto.billingEmail,
        name: dto.billingName,
        organization: dto.billingOrganization,
        address: dto.billingAddress,
        city: dto.billingCity,
        postalCode: dto.billingPostalCode,
        country: dto.billingCountry,
        notes: dto.customerNotes,
      },
      dto.couponCode || undefined,
    );
    return CheckoutResponseDto.fromResult(result);
  }
}
