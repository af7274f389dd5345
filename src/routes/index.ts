import { Router } from 'express';
import sarRoutes from './sar';
import configRoutes from './config';
import { settings } from '../config/settings';

const router = Router();

router.use('/sar', sarRoutes);
router.use('/config', configRoutes);

router.get('/', (req, res) => {
    res.json({
        name: `${settings.appName} API`,
        version: settings.appVersion,
        description: 'Explainable suspicious activity report generation with a hash-chained audit trail',
        status: 'Active',
        endpoints: {
            'POST /api/sar/generate': 'Generate (or return the existing) SAR narrative for a case',
            'GET /api/sar': 'List recent SAR cases',
            'GET /api/sar/stats/overview': 'Dashboard statistics',
            'GET /api/sar/:narrativeId': 'Get a SAR narrative with case and customer details',
            'GET /api/sar/:narrativeId/audit': 'Get the audit trail, chain validity and sentence attribution',
            'POST /api/sar/:narrativeId/approve': 'Approve a SAR narrative for filing',

            'GET /api/config': 'Active jurisdiction and deployment settings',
            'GET /health': 'System health check',
            'GET /api': 'This API information'
        },
        jurisdiction: settings.jurisdiction,
        timestamp: new Date().toISOString(),
        environment: process.env.NODE_ENV || 'development'
    });
});

export default router;
