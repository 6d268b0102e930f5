import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { z } from 'zod';

export const triggerEventSchema = z.object({
  kind: z.enum(['pull_request', 'push']),
  branch: z.string().trim().min(1),
  revision: z.string().trim().min(1).optional(),
  repository: z.string().trim().min(1).optional(),
});

export class TriggerRunDto {
  @ApiProperty({ enum: ['pull_request', 'push'], example: 'pull_request' })
  kind!: 'pull_request' | 'push';

  @ApiProperty({ description: 'Destination branch (PR base, or pushed branch)', example: 'main' })
  branch!: string;

  @ApiPropertyOptional({ description: 'Commit to check out', example: 'abc123' })
  revision?: string;

  @ApiPropertyOptional({ example: 'example/space-battle' })
  repository?: string;
}
