import { Module, type DynamicModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import type { PdfContextConfigInput } from './config/pdf-context.config';
import { PdfContextModule } from './modules/pdf-context/pdf-context.module';

@Module({})
export class AppModule {
  static forRoot(overrides: PdfContextConfigInput = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [ConfigModule.forRoot({ isGlobal: true }), PdfContextModule.forRoot(overrides)]
    };
  }
}
