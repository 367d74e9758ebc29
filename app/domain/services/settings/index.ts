export { SettingsService, type ISettingsService, type SettingsListener } from './settings.service';
