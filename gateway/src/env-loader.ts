// Environment variable loader - must be imported first
import dotenv from 'dotenv';
import path from 'path';

// Root .env when started from the repository root, parent .env when started from gateway/.
// dotenv never overrides variables that are already set, so the first file wins.
dotenv.config({ path: path.resolve(process.cwd(), '.env') });
dotenv.config({ path: path.resolve(process.cwd(), '..', '.env') });
