import { config } from "dotenv";

// Imported first by the CLI so the logger sees SYNC_LOG_LEVEL from .env.local.
config({ path: ".env.local" });
