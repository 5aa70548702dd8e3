import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import reportConfig from './config/report.config';
import { CliModule } from './cli/cli.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [reportConfig],
    }),
    CliModule,
  ],
})
export class AppModule {}
