import { Body, Controller, Get, Param, ParseUUIDPipe, Post, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { SubscriptionService, AccessStatus } from '../services/subscription.service';
import { StartTrialDto, SubscriptionResponseDto } from '../dto/subscription.dto';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { CurrentUser } from '../../auth/decorators/current-user.decorator';
import { User } from '../../user/entities/user.entity';

@ApiTags('subscriptions')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard)
@Controller('subscriptions')
export class SubscriptionController {
  constructor(private readonly subscriptionService: SubscriptionService) {}

  @Get()
  @ApiOperation({ summary: "List the current user's package subscriptions" })
  @ApiResponse({ status: 200, type: [SubscriptionResponseDto] })
  async list(@CurrentUser() user: User): Promise<SubscriptionResponseDto[]> {
    const subscriptions = await this.subscriptionService.listForUser(user.id);
    const now = new Date();
    return subscriptions.map((subscription) => SubscriptionResponseDto.fromEntity(subscription, now));
  }

  @Get('access/:packageId')
  @ApiOperation({ summary: 'Check access to a package' })
  async access(
    @CurrentUser() user: User,
    @Param('packageId', ParseUUIDPipe) packageId: string,
  ): Promise<AccessStatus> {
    return this.subscriptionService.getAccessStatus(user.id, packageId);
  }

  @Post('trial')
  @ApiOperation({ summary: 'Start the trial period of a package' })
  @ApiResponse({ status: 201, type: SubscriptionResponseDto })
  @ApiResponse({ status: 409, description: 'The user already holds or held the package' })
  async startTrial(@CurrentUser() user: User, @Body() dto: StartTrialDto): Promise<SubscriptionResponseDto> {
    const subscription = await this.subscriptionService.startTrial(user.id, dto.packageId);
    return SubscriptionResponseDto.fromEntity(subscription);
  }
}
