export * from './commands/generate-scanimation.command.js';
export * from './dto/generate-scanimation.dto.js';
export * from './handlers/generate-scanimation.handler.js';
