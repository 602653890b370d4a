import type { JsonValue } from 'type-fest';
import type { ApiClient } from '../services/api-client.js';
import type { PathGuard } from '../services/path-guard.js';
import type { FileOperation, FileOperationOutcome } from '../types/security.js';
import { ErrorType } from '../types/error-handler.js';
import { ErrorHandler, SecureError } from '../utils/error-handler.js';
import { checkUserInput } from '../utils/security.js';
import { logger } from '../utils/logger.js';
import { ERROR_MESSAGES, INFO_MESSAGES } from '../constants/messages.js';

export interface SecureAppDependencies {
  client: ApiClient;
  pathGuard: PathGuard;
}

// Wires the input check in front of the client and exposes the path guard.
export class SecureApp {
  private readonly client: ApiClient;
  private readonly pathGuard: PathGuard;

  constructor({ client, pathGuard }: SecureAppDependencies) {
    this.client = client;
    this.pathGuard = pathGuard;
  }

  processUserRequest = async (userId: string, userInput: string): Promise<JsonValue> => {
    const inputCheck = checkUserInput(userInput);
    if (!inputCheck.isValid) {
      throw ErrorHandler.getInstance().handleError(
        new SecureError(
          `${ERROR_MESSAGES.INVALID_USER_INPUT}: ${inputCheck.error}`,
          ErrorType.INVALID_ARGUMENT,
          { operation: 'processUserRequest', userId },
          true
        )
      );
    }

    logger.info(`${INFO_MESSAGES.FETCHING_USER} ${userId}`);
    return this.client.getUserInfo(userId);
  };

  handleFileOperation = (filePath: string, operation: FileOperation = 'read'): Promise<FileOperationOutcome> =>
    this.pathGuard.perform(filePath, operation);
}
