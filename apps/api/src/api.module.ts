import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CqrsModule } from '@nestjs/cqrs';
import apiConfig from './api.config';
import { UploadsModule } from './modules/uploads/uploads.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [apiConfig],
    }),
    CqrsModule.forRoot(),
    UploadsModule,
  ],
  controllers: [],
  providers: [],
})
export class ApiModule { }
