/**
 * Environment setup for CLI - must be imported before any other modules
 *
 * Loads `.env` from the working directory. Variables already set in the
 * environment take precedence over the file.
 */
import { config } from 'dotenv';

config();
