import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from '../../config/configuration';
import { GitHubLoggerService } from '../logging/github-logger.service';
import { ErrorAnalyzerService } from './error-analyzer.service';
import { OperationContextService } from './operation-context.service';
import { DEFAULT_RETRY_RUNTIME, RETRY_RUNTIME } from './retry-runtime';
import { RetryStrategyService } from './retry-strategy.service';

/**
 * GitHub Error Handler Module
 *
 * Provides error analysis, retries and structured operation logging for
 * GitHub API calls
 */
@Module({
  imports: [ConfigModule.forRoot({ load: [configuration] })],
  providers: [
    { provide: RETRY_RUNTIME, useValue: DEFAULT_RETRY_RUNTIME },
    GitHubLoggerService,
    ErrorAnalyzerService,
    RetryStrategyService,
    OperationContextService,
  ],
  exports: [
    GitHubLoggerService,
    ErrorAnalyzerService,
    RetryStrategyService,
    OperationContextService,
  ],
})
export class GitHubErrorHandlerModule {}
