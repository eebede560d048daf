import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { ApiDocumented } from '../../common/decorators/api-documented.decorator';
import { ApiResponseDto } from '../../common/dtos/api-response.dto';
import { AuthorizeRole } from '../decorators/authorize-role.decorator';
import { CurrentIdentity } from '../decorators/current-identity.decorator';
import { SessionUserDto } from '../dto/auth-session.dto';
import { AuthorizedIdentity } from '../interfaces/identity.interface';

@ApiTags('Account')
@Controller('api/account')
export class AccountController {
  @Get('profile')
  @AuthorizeRole('User;Admin')
  @ApiDocumented({ summary: 'Profile of the signed-in user' })
  getProfile(
    @CurrentIdentity() authorized: AuthorizedIdentity | undefined,
  ): ApiResponseDto<SessionUserDto | null> {
    if (!authorized) {
      return new ApiResponseDto('Profile retrieved', null);
    }

    const { identity, roles } = authorized;
    return new ApiResponseDto('Profile retrieved', {
      id: identity.id,
      userName: identity.userName,
      email: identity.email,
      displayName: identity.displayName,
      roles,
    });
  }
}
