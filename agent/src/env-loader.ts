// Must run before any module reads process.env
import { config } from 'dotenv';

config();
