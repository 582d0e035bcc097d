import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import type { SchedulingServices } from '../core/scheduling';
import { isShopSettingKey, SHOP_SETTING_RULES } from '../core/scheduling/shopSettings';
import { handleRouteError, respondInvalid } from './helpers';

const settingValueSchema = z.object({ value: z.number() });

const settingsPatchSchema = z.object({
  baseGridMinutes: z.number().optional(),
  shortServiceThresholdMinutes: z.number().optional(),
  restMinutesAfterShort: z.number().optional(),
  extraRoundMinutes: z.number().optional(),
  minLeadMinutes: z.number().optional(),
}).strict();

export function createSettingsRouter(services: SchedulingServices, requireAdmin: RequestHandler): Router {
  const router = Router();

  router.get('/api/admin/settings', requireAdmin, async (req, res) => {
    try {
      const settings = await services.config.getShopSettings();
      res.json({ settings, rules: SHOP_SETTING_RULES });
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to fetch settings', 'SETTINGS_FETCH_ERROR');
    }
  });

  router.put('/api/admin/settings', requireAdmin, async (req, res) => {
    const parsed = settingsPatchSchema.safeParse(req.body);
    if (!parsed.success) return respondInvalid(req, res, parsed.error);

    try {
      const settings = await services.config.updateShopSettings(parsed.data);
      res.json({ settings });
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to update settings', 'SETTINGS_UPDATE_ERROR');
    }
  });

  router.get('/api/admin/settings/:key', requireAdmin, async (req, res) => {
    const key = req.params.key;
    if (!isShopSettingKey(key)) {
      return res.status(404).json({ error: `Unknown setting: ${key}`, code: 'NOT_FOUND', requestId: req.requestId });
    }

    try {
      const value = await services.config.getShopSetting(key);
      res.json({ key, value });
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to fetch setting', 'SETTING_FETCH_ERROR');
    }
  });

  router.put('/api/admin/settings/:key', requireAdmin, async (req, res) => {
    const parsed = settingValueSchema.safeParse(req.body);
    if (!parsed.success) return respondInvalid(req, res, parsed.error);

    try {
      const settings = await services.config.setShopSetting(req.params.key, parsed.data.value);
      res.json({ settings });
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to update setting', 'SETTING_UPDATE_ERROR');
    }
  });

  return router;
}
