import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LoggerModule } from 'nestjs-pino';

import configuration from './config/configuration';
import { validateEnvironment } from './config/environment.validation';
import { EngineModule } from './engine/engine.module';
import { WsModule } from './ws/ws.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [configuration],
      validate: validateEnvironment,
      expandVariables: true,
    }),
    LoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const env = configService.get<string>('env', 'development');
        const level = configService.get<string>('logging.level', 'info');
        const structured = configService.get<boolean>('logging.structured', true);
        const pretty = env !== 'production' || !structured;

        return {
          pinoHttp: {
            level,
            transport: pretty
              ? {
                  target: 'pino-pretty',
                  options: {
                    colorize: true,
                    singleLine: false,
                    translateTime: 'SYS:standard',
                  },
                }
              : undefined,
            base: undefined,
          },
        };
      },
    }),
    EngineModule,
    WsModule,
  ],
})
export class AppModule {}
