import * as dotenv from "dotenv";

// Load environment variables from .env file
dotenv.config();
