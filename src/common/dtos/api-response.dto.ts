import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * Envelope of every rejection the pipeline produces (except 403, which has
 * no body).
 */
export class StatusResponseDto {
  @ApiProperty({ example: false })
  status!: boolean;

  @ApiProperty({ example: 'Unable to verify request sender.' })
  message!: string;

  @ApiPropertyOptional({ type: [String] })
  errors?: string[];
}

/**
 * Envelope of successful responses
 */
export class ApiResponseDto<T> {
  status: boolean;
  message: string;
  data: T;

  constructor(message: string, data: T) {
    this.status = true;
    this.message = message;
    this.data = data;
  }
}
