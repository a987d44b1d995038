import { Module } from '@nestjs/common';
import { MikroOrmModule } from '@mikro-orm/nestjs';
import { Coupon } from './entities/coupon.entity';
import { CouponService } from './services/coupon.service';

@Module({
  imports: [MikroOrmModule.forFeature([Coupon])],
  providers: [CouponService],
  exports: [CouponService],
})
export class CouponModule {}
