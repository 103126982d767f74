import * as dotenv from "dotenv";
dotenv.config();

/** Verbose core logs */
export const CORE_VERBOSE = process.env.CORE_VERBOSE === "1";

/** Inputs that close the dialogue, compared case-insensitively */
export const EXIT_KEYWORDS = (process.env.EXIT_KEYWORDS || "exit,quit")
  .split(",")
  .map((s) => s.trim().toLowerCase())
  .filter(Boolean);
