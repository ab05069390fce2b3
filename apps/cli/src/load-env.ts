// Imported first by the entry point so `.env` is loaded before any module reads process.env
import { initEnv } from '@allelebase/config';

export const envResult = initEnv();
