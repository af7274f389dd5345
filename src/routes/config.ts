import { Router, Request, Response } from 'express';
import { ApiResponse, ConfigResponse } from '../types/api';
import { SUPPORTED_JURISDICTIONS } from '../config/jurisdictions';
import { settings } from '../config/settings';

const router = Router();

router.get('/', (req: Request, res: Response) => {
    const response: ApiResponse<ConfigResponse> = {
        success: true,
        data: {
            jurisdiction: settings.jurisdiction,
            deploymentEnv: settings.deploymentEnv,
            supportedJurisdictions: [...SUPPORTED_JURISDICTIONS]
        },
        timestamp: new Date().toISOString()
    };

    res.json(response);
});

export default router;
