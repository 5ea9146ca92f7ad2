/**
 * Basic NestJS Application Example
 *
 * Shows how to register the Xapiand model module and use models from a
 * NestJS controller.
 */

import { Module, Injectable, Controller, Get, Query, Post, Body, Param } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import {
  DefinedModel,
  InjectModel,
  XapiandModelModule,
  XapiandModelService,
  Profile,
  loadClientConfig,
} from '../src';

@Injectable()
export class ProfileDirectory {
  constructor(
    private readonly models: XapiandModelService,
    @InjectModel('Profile') private readonly profiles: DefinedModel,
  ) {}

  async register(entityId: string, name: string) {
    const profile = await this.models.create(this.profiles, { entity_id: entityId, name });
    return profile.toJSON();
  }

  async find(entityId: string, query?: string) {
    const page = await this.models.filter(this.profiles, { entity_id: entityId, query, limit: 20 });
    return {
      profiles: page.results.map(profile => profile.toJSON()),
      total: page.matchesEstimated,
    };
  }
}

@Controller('entities/:entityId/profiles')
export class ProfileController {
  constructor(private readonly directory: ProfileDirectory) {}

  @Get()
  async search(@Param('entityId') entityId: string, @Query('q') query?: string) {
    return this.directory.find(entityId, query);
  }

  @Post()
  async create(@Param('entityId') entityId: string, @Body() body: { name: string }) {
    return this.directory.register(entityId, body.name);
  }
}

@Module({
  imports: [XapiandModelModule.forFeature([Profile])],
  controllers: [ProfileController],
  providers: [ProfileDirectory],
})
export class ProfileModule {}

@Module({
  imports: [
    XapiandModelModule.forRootAsync({
      isGlobal: true,
      useFactory: () => loadClientConfig(),
    }),
    ProfileModule,
  ],
})
export class AppModule {}

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  await app.listen(3000);
  console.log('Application is running on: http://localhost:3000');
}

if (require.main === module) {
  bootstrap().catch(console.error);
}
