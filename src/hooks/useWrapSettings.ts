import { useCallback, useMemo, useState } from 'react';
import { logger, saveConfig } from '../utils/index.js';
import type { EditorSettings } from '../utils/index.js';
import { DEFAULT_TRIGGER_OPTIONS } from '../wrap/index.js';
import type { TriggerOptions } from '../wrap/index.js';

export interface UseWrapSettingsResult {
  settings: EditorSettings;
  triggerOptions: TriggerOptions;
  setWidth: (width: number) => void;
  setDelimiter: (delimiter: string) => void;
  toggleAutoWrap: () => boolean;
  save: () => boolean;
}

export function useWrapSettings(initial: EditorSettings): UseWrapSettingsResult {
  const [settings, setSettings] = useState<EditorSettings>(initial);

  const triggerOptions = useMemo<TriggerOptions>(() => ({
    width: settings.width,
    delimiter: settings.delimiter,
    tabWidth: settings.tabWidth,
    enabled: settings.autoWrap,
    triggerKeys: DEFAULT_TRIGGER_OPTIONS.triggerKeys,
  }), [settings]);

  const setWidth = useCallback((width: number) => {
    setSettings(prev => ({ ...prev, width }));
    logger.info(`Width set to ${width}`);
  }, []);

  const setDelimiter = useCallback((delimiter: string) => {
    setSettings(prev => ({ ...prev, delimiter }));
    logger.info(`Delimiter set to ${delimiter}`);
  }, []);

  const toggleAutoWrap = useCallback((): boolean => {
    const next = !settings.autoWrap;
    setSettings(prev => ({ ...prev, autoWrap: next }));
    logger.info(`Auto-wrap ${next ? 'enabled' : 'disabled'}`);
    return next;
  }, [settings.autoWrap]);

  const save = useCallback((): boolean => {
    const { width, delimiter, tabWidth, autoWrap } = settings;
    return saveConfig({ width, delimiter, tabWidth, autoWrap });
  }, [settings]);

  return { settings, triggerOptions, setWidth, setDelimiter, toggleAutoWrap, save };
}
