import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from './config/configuration';
import { ediConfig } from './edi/config/edi.config';
import { PdfModule } from './pdf/pdf.module';
import { EdiModule } from './edi/edi.module';
import { AppController } from './app.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration, ediConfig],
      envFilePath: ['.env.local', '.env'],
    }),
    PdfModule,
    EdiModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
