import {
  TextractClient,
  StartDocumentTextDetectionCommand,
  GetDocumentTextDetectionCommand,
} from '@aws-sdk/client-textract';
import { waitForJob } from './wait-for-job';
import { toDetectedLines } from '../utils/textract-parser';
import { DetectedLine, ObjectRef, TextDetectionService } from '../types';
import { Logger, logger as rootLogger } from '../logger';

export interface TextractTextDetectorOptions {
  pollIntervalMs: number;
  logger?: Logger;
}

export class TextractTextDetector implements TextDetectionService {
  private readonly logger: Logger;

  constructor(
    private readonly textractClient: TextractClient,
    private readonly options: TextractTextDetectorOptions
  ) {
    this.logger = options.logger ?? rootLogger;
  }

  /**
   * Entrega las líneas página a página; la siguiente página solo se pide
   * cuando el consumidor sigue iterando.
   */
  async *detectText(ref: ObjectRef): AsyncGenerator<DetectedLine> {
    const started = await this.textractClient.send(new StartDocumentTextDetectionCommand({
      DocumentLocation: { S3Object: { Bucket: ref.bucketName, Name: ref.objectKey } }
    }));
    const jobId = started.JobId;
    if (!jobId) {
      throw new Error('Textract no devolvió un JobId para StartDocumentTextDetection.');
    }
    this.logger.info({ jobId }, 'Detección de texto iniciada');

    let page = await waitForJob(
      () => this.textractClient.send(new GetDocumentTextDetectionCommand({ JobId: jobId })),
      { jobId, intervalMs: this.options.pollIntervalMs, logger: this.logger }
    );

    while (true) {
      yield* toDetectedLines(page.Blocks ?? []);

      const nextToken = page.NextToken;
      if (!nextToken) return;
      page = await this.textractClient.send(new GetDocumentTextDetectionCommand({ JobId: jobId, NextToken: nextToken }));
    }
  }
}
