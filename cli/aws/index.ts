import { S3Client } from '@aws-sdk/client-s3';
import { TextractClient } from '@aws-sdk/client-textract';
import { S3ObjectStore } from './s3-object-store';
import { TextractExpenseAnalyzer } from './textract-expense-analyzer';
import { TextractTextDetector } from './textract-text-detector';
import { ExtractorConfig } from '../config';
import { PipelineServices } from '../types';

export function createAwsServices(config: ExtractorConfig): PipelineServices {
  const clientConfig = config.region ? { region: config.region } : {};
  const s3Client = new S3Client(clientConfig);
  const textractClient = new TextractClient(clientConfig);
  const pollIntervalMs = config.pollIntervalMs;

  return {
    store: new S3ObjectStore(s3Client),
    analyzer: new TextractExpenseAnalyzer(textractClient, { pollIntervalMs }),
    detector: new TextractTextDetector(textractClient, { pollIntervalMs }),
  };
}
