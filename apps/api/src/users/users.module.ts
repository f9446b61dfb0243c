import { Module } from '@nestjs/common';
import { DatabaseModule } from '@contacts/database';
import { StorageModule } from '../storage/storage.module';
import { UsersService } from './users.service';
import { UsersController } from './users.controller';

/**
 * UsersModule — identity store and profile routes.
 *
 * Exports UsersService for AuthModule (signup, login, token checks).
 */
@Module({
  imports: [DatabaseModule.forFeature(), StorageModule],
  controllers: [UsersController],
  providers: [UsersService],
  exports: [UsersService],
})
export class UsersModule {}
