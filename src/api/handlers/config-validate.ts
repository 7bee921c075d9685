import type { Request, Response } from 'express';
import type { ConfigValidationData } from '../../types/api.js';
import { validateRelayConfig } from '../../config/relay-config-schema.js';
import type { RelayConfig } from '../../config/relay-config.js';
import { sendOk } from '../shared.js';

export interface ConfigValidateDeps {
    config: RelayConfig;
}

/** GET /config/validate: validation report for the running configuration. */
export function handleConfigValidate(deps: ConfigValidateDeps) {
    return (_req: Request, res: Response): void => {
        const result = validateRelayConfig(deps.config);

        const data: ConfigValidationData = {
            valid: result.valid,
            errors: result.errors,
            warnings: result.warnings,
            validatedAt: new Date().toISOString(),
        };

        // 200 even when invalid; `valid` carries the verdict.
        sendOk(res, data);
    };
}
