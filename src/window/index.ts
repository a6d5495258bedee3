/**
 * Window Module
 */

export {
  selectWindow,
  isWithinWindow,
  formatDateLabel,
  formatTimeOfDay,
  getZonedParts,
  zonedTimeToInstant,
} from './selector.js';
