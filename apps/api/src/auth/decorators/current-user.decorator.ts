import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { AuthenticatedRequest, RequestUser } from '../interfaces';

/**
 * Extracts the caller resolved by JwtAuthGuard, i.e. the owner every
 * contact operation is scoped to.
 *
 * ```ts
 * @Get(':id')
 * @UseGuards(JwtAuthGuard)
 * getOne(@CurrentUser() user: RequestUser, @Param('id', ParseIntPipe) id: number) { ... }
 * ```
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): RequestUser =>
    ctx.switchToHttp().getRequest<AuthenticatedRequest>().user,
);
