import dotenv from "dotenv";

dotenv.config();

export const env = {
  NODE_ENV: process.env.NODE_ENV,
  // debug | info | warn | error | silent
  LOG_LEVEL: process.env.PYREVIEW_LOG_LEVEL,
  OUTPUT: process.env.PYREVIEW_OUTPUT,
  MAX_FILES: Number(process.env.PYREVIEW_MAX_FILES) || undefined,
};
