import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiBody, ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { ApiDocumented } from '../../common/decorators/api-documented.decorator';
import { ApiResponseDto } from '../../common/dtos/api-response.dto';
import { AuthSessionDto } from '../dto/auth-session.dto';
import { LoginDto, RefreshTokenDto } from '../dto/login.dto';
import { AuthService } from '../services/auth.service';

@ApiTags('Authentication')
@Controller('api/auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('login')
  @HttpCode(HttpStatus.OK)
  @ApiDocumented({
    summary: 'Sign in with email and password',
    exempt: true,
  })
  @ApiBody({ type: LoginDto })
  @ApiOkResponse({ type: AuthSessionDto })
  async login(@Body() dto: LoginDto): Promise<ApiResponseDto<AuthSessionDto>> {
    const session = await this.authService.login(dto);
    return new ApiResponseDto('Login successful', session);
  }

  @Post('refresh-token')
  @HttpCode(HttpStatus.OK)
  @ApiDocumented({
    summary: 'Rotate a refresh token',
    description: 'The presented refresh token is revoked and a new pair issued',
  })
  @ApiBody({ type: RefreshTokenDto })
  @ApiOkResponse({ type: AuthSessionDto })
  async refreshToken(
    @Body() dto: RefreshTokenDto,
  ): Promise<ApiResponseDto<AuthSessionDto>> {
    const session = await this.authService.refresh(dto);
    return new ApiResponseDto('Token refreshed successfully', session);
  }
}
