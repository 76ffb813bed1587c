import {
  TextractClient,
  StartExpenseAnalysisCommand,
  GetExpenseAnalysisCommand,
  ExpenseDocument,
} from '@aws-sdk/client-textract';
import { waitForJob } from './wait-for-job';
import { parseExpenseDocuments } from '../utils/textract-parser';
import { ExpenseAnalysis, ExpenseAnalysisService, ObjectRef } from '../types';
import { Logger, logger as rootLogger } from '../logger';

export interface TextractExpenseAnalyzerOptions {
  pollIntervalMs: number;
  logger?: Logger;
}

export class TextractExpenseAnalyzer implements ExpenseAnalysisService {
  private readonly logger: Logger;

  constructor(
    private readonly textractClient: TextractClient,
    private readonly options: TextractExpenseAnalyzerOptions
  ) {
    this.logger = options.logger ?? rootLogger;
  }

  async analyzeExpense(ref: ObjectRef): Promise<ExpenseAnalysis> {
    const started = await this.textractClient.send(new StartExpenseAnalysisCommand({
      DocumentLocation: { S3Object: { Bucket: ref.bucketName, Name: ref.objectKey } }
    }));
    const jobId = started.JobId;
    if (!jobId) {
      throw new Error('Textract no devolvió un JobId para StartExpenseAnalysis.');
    }
    this.logger.info({ jobId }, 'Análisis de gastos iniciado');

    const firstPage = await waitForJob(
      () => this.textractClient.send(new GetExpenseAnalysisCommand({ JobId: jobId })),
      { jobId, intervalMs: this.options.pollIntervalMs, logger: this.logger }
    );

    const documents: ExpenseDocument[] = [...(firstPage.ExpenseDocuments ?? [])];
    let nextToken = firstPage.NextToken;
    while (nextToken) {
      const page = await this.textractClient.send(new GetExpenseAnalysisCommand({ JobId: jobId, NextToken: nextToken }));
      documents.push(...(page.ExpenseDocuments ?? []));
      nextToken = page.NextToken;
    }

    if (documents.length > 1) {
      this.logger.info({ sections: documents.length }, 'Varias secciones de documento, se unen en una');
    }
    return parseExpenseDocuments(documents);
  }
}
