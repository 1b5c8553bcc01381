// Module
export * from './shared.module';
export * from './lifecycle/shutdown.signal';

// Types
export * from './types/meeting.types';
export * from './types/questionnaire.types';
export * from './types/action.types';
export * from './types/telegram.types';

// Config
export * from './config/configuration';
export * from './config/validation.schema';

// Errors
export * from './errors/feedback.errors';

// Utils
export * from './utils/action-parser.utils';
export * from './utils/html.utils';
export * from './utils/schema.utils';

// Constants
export * from './constants/questions';
