import { config } from "dotenv";

// .env.local wins over .env; neither overrides the real environment
config({ path: ".env.local" });
config();
