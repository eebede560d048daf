import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class SessionUserDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  userName!: string;

  @ApiProperty()
  email!: string;

  @ApiPropertyOptional()
  displayName?: string;

  @ApiProperty({ type: [String] })
  roles!: string[];
}

export class AuthSessionDto {
  @ApiProperty({ description: 'Signed access token' })
  token!: string;

  @ApiProperty({ description: 'Opaque refresh secret' })
  refreshToken!: string;

  @ApiProperty({ description: 'Unix seconds' })
  expires!: number;

  @ApiProperty({ type: SessionUserDto })
  user!: SessionUserDto;
}
