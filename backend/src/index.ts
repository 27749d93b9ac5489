import * as path from 'path';
import { ConfigManager, DEFAULT_JWT_SECRET } from './configManager.js';
import { openDatabase } from './database.js';
import { createLogger, enableNamespaces, NAMESPACES } from './logging.js';
import { BookService } from './services/BookService.js';
import { MessageService } from './services/MessageService.js';
import { SessionService } from './services/SessionService.js';
import { UserService } from './services/UserService.js';
import { BackgroundWrites } from './jobs/backgroundWrites.js';
import { TurnLock } from './utils/turnLock.js';
import { StoryBuddyAgent } from './agents/StoryBuddyAgent.js';
import { createPromptEnvironment } from './agents/BaseAgent.js';
import { StageController } from './agents/StageController.js';
import { TokenService } from './auth/tokenService.js';
import { GoogleIdentityVerifier } from './auth/identityVerifier.js';
import { LoginService } from './auth/loginService.js';
import { createApp } from './server.js';

const serverLog = createLogger(NAMESPACES.server.main);

function main(): void {
  const configManager = new ConfigManager();
  const config = configManager.getConfig();
  enableNamespaces(config.debug.enabledNamespaces);

  const settings = configManager.getServerSettings();
  const auth = configManager.getAuthSettings();
  if (auth.jwtSecret === DEFAULT_JWT_SECRET) {
    console.warn('[SERVER] JWT secret is the built-in default; set JWT_SECRET before deploying');
  }
  if (!auth.googleClientId) {
    console.warn('[SERVER] GOOGLE_CLIENT_ID is not set; login tokens will not be checked against an audience');
  }

  const db = openDatabase(path.resolve(settings.databasePath));
  const books = new BookService(db);
  const seeded = books.seedFromDirectory(path.resolve(settings.booksDirectory));
  serverLog('Seeded %d new book(s) from %s', seeded, settings.booksDirectory);

  const messages = new MessageService(db);
  const sessions = new SessionService(db, messages);
  const users = new UserService(db);
  const writes = new BackgroundWrites();

  const agent = new StoryBuddyAgent(configManager, createPromptEnvironment(path.resolve(settings.promptsDirectory)));
  const controller = new StageController({
    books,
    sessions,
    messages,
    generator: agent,
    writes,
    turnLock: new TurnLock(),
    policy: configManager.getStoryPolicy(),
    features: configManager.getFeatures()
  });
  const login = new LoginService(new GoogleIdentityVerifier(auth.googleClientId), users, new TokenService(auth));

  const app = createApp({ controller, books, sessions, login, server: settings });
  const server = app.listen(settings.port, () => {
    console.log(`[SERVER] Story Buddy API listening on port ${settings.port}`);
  });

  const shutdown = (signal: string) => {
    serverLog('Received %s, shutting down', signal);
    server.close(() => {
      writes
        .flush()
        .then(() => {
          if (writes.failedCount > 0) {
            console.warn(`[SERVER] ${writes.failedCount} background write(s) were dropped this run`);
          }
          db.close();
          process.exit(0);
        })
        .catch((error: unknown) => {
          console.error('[SERVER] Failed to flush pending writes:', error);
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main();
