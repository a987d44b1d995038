import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsEmail, IsISO31661Alpha2, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { Transform } from 'class-transformer';
import { CheckoutResult } from '../services/checkout.service';
import { formatMinorUnits } from '../../../common/utils/money.util';

const trim = ({ value }: { value: unknown }): unknown => (typeof value === 'string' ? value.trim() : value);

export class CheckoutDto {
  @ApiProperty({ example: 'kari@example.no' })
  @Transform(trim)
  @IsEmail()
  billingEmail!: string;

  @ApiProperty({ example: 'Kari Nordmann' })
  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  billingName!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(200)
  billingOrganization?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(500)
  billingAddress?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(100)
  billingCity?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(20)
  billingPostalCode?: string;

  @ApiPropertyOptional({ default: 'NO' })
  @IsOptional()
  @IsISO31661Alpha2()
  billingCountry?: string;

  @ApiPropertyOptional({ example: 'TEST10' })
  @IsOptional()
  @Transform(trim)
  @IsString()
  @MaxLength(50)
  couponCode?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  customerNotes?: string;
}

export class CheckoutResponseDto {
  @ApiProperty()
  orderId!: string;

  @ApiProperty({ example: 'ORD202601011200' })
  orderNumber!: string;

  @ApiProperty({ description: 'Pass to Stripe.js to confirm the payment', nullable: true })
  clientSecret!: string | null;

  @ApiProperty()
  paymentIntentId!: string;

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

  static fromResult(result: CheckoutResult): CheckoutResponseDto {
    const dto = new CheckoutResponseDto();
    dto.orderId = result.orderId;
    dto.orderNumber = result.orderNumber;
    dto.clientSecret = result.clientSecret;
    dto.paymentIntentId = result.paymentIntentId;
    dto.currency = result.currency;
    dto.totalAmount = result.totalAmount;
    dto.discountAmount = result.discountAmount;
    dto.taxAmount = result.taxAmount;
    dto.finalAmount = result.finalAmount;
    dto.formattedFinalAmount = formatMinorUnits(result.finalAmount);
    dto.couponCode = result.couponCode;
    return dto;
  }
}
