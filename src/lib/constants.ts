export const APP_NAME = 'Gridpane';

export const FEATURES_SECTION = 'features';
