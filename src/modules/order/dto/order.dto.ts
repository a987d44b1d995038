import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Order, OrderPaymentStatus, OrderStatus } from '../entities/order.entity';
import { canBeCancelled } from '../domain/order-totals';
import { formatMinorUnits } from '../../../common/utils/money.util';

export class OrderItemResponseDto {
  @ApiProperty()
  packageId!: string;

  @ApiProperty()
  packageName!: string;

  @ApiProperty()
  quantity!: number;

  @ApiProperty()
  price!: number;

  @ApiProperty()
  lineTotal!: number;
}

export class OrderResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  orderNumber!: string;

  @ApiProperty({ enum: OrderStatus })
  status!: OrderStatus;

  @ApiProperty({ enum: OrderPaymentStatus })
  paymentStatus!: OrderPaymentStatus;

  @ApiProperty({ type: [OrderItemResponseDto] })
  items!: OrderItemResponseDto[];

  @ApiProperty()
  currency!: string;

  @ApiProperty()
  totalAmount!: number;

  @ApiProperty()
  discountAmount!: number;

  @ApiProperty()
  taxAmount!: number;

  @ApiProperty()
  finalAmount!: number;

  @ApiProperty({ example: '2250.00' })
  formattedFinalAmount!: string;

  @ApiPropertyOptional()
  couponCode?: string;

  @ApiProperty()
  canBeCancelled!: boolean;

  @ApiProperty()
  createdAt!: Date;

  @ApiPropertyOptional()
  paidAt?: Date;

  @ApiPropertyOptional()
  cancelledAt?: Date;

  static fromEntity(order: Order): OrderResponseDto {
    const dto = new OrderResponseDto();
    dto.id = order.id;
    dto.orderNumber = order.orderNumber;
    dto.status = order.status;
    dto.paymentStatus = order.paymentStatus;
    dto.items = order.items.isInitialized()
      ? order.items.getItems().map((item) => ({
          packageId: item.package.id,
          packageName: item.package.name,
          quantity: item.quantity,
          price: item.price,
          lineTotal: item.price * item.quantity,
        }))
      : [];
    dto.currency = order.currency;
    dto.totalAmount = order.totalAmount;
    dto.discountAmount = order.discountAmount;
    dto.taxAmount = order.taxAmount;
    dto.finalAmount = order.finalAmount;
    dto.formattedFinalAmount = formatMinorUnits(order.finalAmount);
    dto.couponCode = order.couponCode;
    dto.canBeCancelled = canBeCancelled(order);
    dto.createdAt = order.createdAt;
    dto.paidAt = order.paidAt;
    dto.cancelledAt = order.cancelledAt;
    return dto;
  }
}
