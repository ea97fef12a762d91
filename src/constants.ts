import Joi from 'joi';
import { RawManifest } from './types';

export const MANIFEST_FILE = 'install-manifest.json';
export const DEFAULT_COMMANDS_DIR = ['.claude', 'commands'];
export const DESTINATION_ENV = 'DBAPPS_COMMANDS_DIR';
export const SYNC_TIMEOUT_MS = 60_000;
export const TEMP_SUFFIX = '.installing';
export const RULE = '='.repeat(45);

export const manifestSchema = Joi.object<RawManifest>({
  version: Joi.string().required(),
  entries: Joi.array().items(
    Joi.object({
      name: Joi.string().required(),
      sources: Joi.array().items(Joi.string()).min(1).max(2).required(),
      target: Joi.string().pattern(/^[^/\\]+$/).invalid('.', '..').optional(),
      command: Joi.string().pattern(/^\/\S+$/).optional(),
      description: Joi.string().optional()
    })
  ).unique('name').required()
}).required();
