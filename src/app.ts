import express, { Request, Response, NextFunction } from 'express';
import { listSchemaNames } from './config/recordSchema';
import { SchemaDefinitionError } from './config/schemaDefinition';
import { DEFAULT_MAX_ERRORS } from './config/settings';
import { UploadError, uploadMiddleware } from './middleware/upload';
import { cleanupFile, ValidationQueue } from './services/validationQueue';
import { RequestError, resolveValidateRequest } from './services/validateRequest';

function isClientError(err: Error): boolean {
  return err instanceof UploadError || err instanceof RequestError || err instanceof SchemaDefinitionError;
}

export function createApp(validationQueue: ValidationQueue = new ValidationQueue()): express.Express {
  const app = express();

  app.use(express.json());

  app.get('/health', (req: Request, res: Response): void => {
    res.json({
      status: 'ok',
      queue: validationQueue.stats(),
    });
  });

  app.get('/api/schemas', (req: Request, res: Response): void => {
    res.json({ success: true, schemas: listSchemaNames() });
  });

  /**
   * API: Upload a file and validate it against a built-in or supplied schema
   */
  app.post('/api/validate', uploadMiddleware, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const file = req.file;
    if (!file) {
      next(new UploadError('No file uploaded'));
      return;
    }

    console.log(`[API] File uploaded: ${file.path}`);
    console.log(`[API] Original filename: ${file.originalname}`);

    try {
      const { schemaName, schema, options } = resolveValidateRequest(req.body, file.path, DEFAULT_MAX_ERRORS);
      const stats = validationQueue.stats();
      console.log(`[Queue] Adding job (queue length: ${stats.length}, running: ${stats.running})`);

      const result = await validationQueue.submit({
        filePath: file.path,
        originalName: file.originalname,
        schemaName,
        schema,
        options,
      });

      res.json({ success: true, schema: schemaName, result });
    } catch (error) {
      // The queue removes files it ran; anything rejected before that is removed here
      cleanupFile(file.path);
      next(error);
    }
  });

  app.use((err: Error, req: Request, res: Response, next: NextFunction): void => {
    if (isClientError(err)) {
      console.warn(`[API] Rejected request: ${err.message}`);
      res.status(400).json({ success: false, error: err.message });
      return;
    }
    console.error('Error:', err);
    res.status(500).json({ success: false, error: err.message || 'Internal server error' });
  });

  return app;
}
