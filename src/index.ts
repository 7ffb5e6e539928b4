// Load environment variables first
import 'dotenv/config';

import logger from 'jet-logger';
import OpenAI from 'openai';

import { loadEnv } from '@src/common/constants/ENV';
import connectDB, { disconnectDB } from '@src/config/database';
import { MongoExtractionRepo } from '@src/repos/ExtractionRepo';
import { MongoUserRepo } from '@src/repos/UserRepo';
import { AuthService } from '@src/services/authService';
import { OpenAIClauseInterpreter } from '@src/services/clauseInterpreter';
import { ExtractionService } from '@src/services/extractionService';
import { extractText } from '@src/services/textExtractor';
import { createApp } from './server';


/******************************************************************************
                                  Run
******************************************************************************/

async function main(): Promise<void> {
  const config = loadEnv();

  const connection = await connectDB(config.mongoUri);

  const users = new MongoUserRepo();
  const auth = new AuthService(users, config.jwt);
  const interpreter = new OpenAIClauseInterpreter(
    new OpenAI({ apiKey: config.openai.apiKey }),
    config.openai.model,
  );
  const extractions = new ExtractionService(
    new MongoExtractionRepo(connection.connection),
    extractText,
    interpreter,
  );

  const app = createApp({ config, auth, users, extractions });

  const server = app.listen(config.port, () => {
    logger.info(`Starting up ${config.appName} on port: ${config.port}`);
  });

  const shutdown = (): void => {
    logger.info(`Shutting down ${config.appName}...`);
    server.close(() => {
      disconnectDB()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.err(err, true);
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  logger.err(err, true);
  process.exit(1);
});
