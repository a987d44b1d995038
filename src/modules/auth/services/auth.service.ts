import { Injectable, UnauthorizedException, ConflictException, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { EntityManager } from '@mikro-orm/core';
import * as bcrypt from 'bcrypt';
import { User } from '../../user/entities/user.entity';
import { StripeService } from '../../payment/services/stripe.service';
import { JwtPayload } from '../interfaces/authenticated-request.interface';

const BCRYPT_ROUNDS = 10;

export interface RegisterParams {
  email: string;
  password: string;
  firstName?: string;
  lastName?: string;
  organization?: string;
  phone?: string;
}

export interface AuthResult {
  user: User;
  token: string;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly em: EntityManager,
    private readonly jwtService: JwtService,
    private readonly stripeService: StripeService,
  ) {}

  async register(params: RegisterParams): Promise<AuthResult> {
    const email = params.email.trim().toLowerCase();

    const existingUser = await this.em.findOne(User, { email });
    if (existingUser) {
      throw new ConflictException('Email already exists');
    }

    const name = [params.firstName, params.lastName].filter(Boolean).join(' ') || undefined;
    const stripeCustomer = await this.stripeService.createCustomer(email, name);

    const user = this.em.create(User, {
      email,
      password: await bcrypt.hash(params.password, BCRYPT_ROUNDS),
      firstName: params.firstName,
      lastName: params.lastName,
      organization: params.organization,
      phone: params.phone,
      stripeCustomerId: stripeCustomer.id,
    });

    await this.em.persistAndFlush(user);
    this.logger.log(`Registered user ${user.id}`);

    return { user, token: this.signToken(user) };
  }

  async login(email: string, password: string): Promise<AuthResult> {
    const user = await this.em.findOne(User, { email: email.trim().toLowerCase() });
    if (!user || !user.isActive || !user.password) {
      throw new UnauthorizedException('Invalid credentials');
    }

    const isPasswordValid = await bcrypt.compare(password, user.password);
    if (!isPasswordValid) {
      throw new UnauthorizedException('Invalid credentials');
    }

    user.lastLoginAt = new Date();
    await this.em.persistAndFlush(user);

    return { user, token: this.signToken(user) };
  }

  async validateUser(id: string): Promise<User> {
    const user = await this.em.findOne(User, { id });
    if (!user || !user.isActive) {
      throw new UnauthorizedException('User not found');
    }
    return user;
  }

  private signToken(user: User): string {
    const payload: JwtPayload = { sub: user.id, email: user.email };
    return this.jwtService.sign(payload);
  }
}
