import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { CLOCK, Clock } from '../common/clock';
import { gatewayConfig } from '../config/gateway.config';
import { StructuredLogger } from '../logging/structured-logger.service';

// Controllers
import { AccountController } from './controllers/account.controller';
import { AuthController } from './controllers/auth.controller';

// Services
import { AuthService } from './services/auth.service';
import { TokenIssuerService } from './services/token-issuer.service';

// Strategies
import { JwtStrategy } from './strategies/jwt.strategy';

// Guards
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { RoleAuthorizationGuard } from './guards/role-authorization.guard';

// Stores
import { IDENTITY_STORE } from './interfaces/identity.interface';
import { InMemoryIdentityStore } from './stores/in-memory-identity.store';
import {
  InMemoryRefreshTokenStore,
  REFRESH_TOKEN_STORE,
} from './stores/refresh-token.store';

const logger = new StructuredLogger('AuthModule');

@Module({
  imports: [
    JwtModule.registerAsync({
      inject: [gatewayConfig.KEY],
      useFactory: (config: ConfigType<typeof gatewayConfig>) => ({
        secret: config.jwt.secret,
        signOptions: {
          algorithm: 'HS256',
          issuer: config.jwt.issuer,
          audience: config.jwt.audience,
        },
      }),
    }),
    PassportModule.register({ defaultStrategy: 'jwt' }),
  ],
  controllers: [AuthController, AccountController],
  providers: [
    {
      provide: IDENTITY_STORE,
      inject: [gatewayConfig.KEY, CLOCK],
      useFactory: (config: ConfigType<typeof gatewayConfig>, clock: Clock) => {
        const store = new InMemoryIdentityStore(clock);
        if (config.identitySeedFile) {
          const count = store.loadFile(config.identitySeedFile);
          logger.log(`Loaded ${count} identities from seed file`);
        }
        return store;
      },
    },
    {
      provide: REFRESH_TOKEN_STORE,
      inject: [CLOCK],
      useFactory: (clock: Clock) => new InMemoryRefreshTokenStore(clock),
    },

    // Services
    TokenIssuerService,
    AuthService,

    // Strategies
    JwtStrategy,

    // Guards
    JwtAuthGuard,
    RoleAuthorizationGuard,
  ],
  exports: [
    IDENTITY_STORE,
    TokenIssuerService,
    JwtAuthGuard,
    RoleAuthorizationGuard,
  ],
})
export class AuthModule {}
