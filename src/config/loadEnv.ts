import dotenvFlow from 'dotenv-flow';

// Imported first by entrypoints so LOG_LEVEL from .env files reaches the logger.
dotenvFlow.config();
