/**
 * Browser automation module public API.
 * Re-exports the Playwright driver and the click escalation ladder.
 */

export { PlaywrightDriver } from './playwright-driver.js';

export { RobustClicker } from './robust-clicker.js';
export type { ClickStage, RobustClickerOptions } from './robust-clicker.js';
