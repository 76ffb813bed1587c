import {
  TextractClient,
  StartExpenseAnalysisCommand,
  GetExpenseAnalysisCommand,
  ExpenseDocument,
} from '@aws-sdk/client-textract';
import { TextractExpenseAnalyzer } from '../cli/aws/textract-expense-analyzer';

const ref = { bucketName: 'test-bucket', objectKey: 'invoice-A.pdf' };

function createClient() {
  return new TextractClient({
    region: 'us-east-1',
    credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' },
  });
}

const page1: ExpenseDocument = {
  SummaryFields: [{ Type: { Text: 'VENDOR_NAME' }, ValueDetection: { Text: 'Acme' } }],
  LineItemGroups: [],
};
const page2: ExpenseDocument = {
  SummaryFields: [{ Type: { Text: 'TOTAL' }, ValueDetection: { Text: '100.00' } }],
  LineItemGroups: [],
};

describe('TextractExpenseAnalyzer', () => {
  it('starts the job, waits for it and collects every page', async () => {
    const client = createClient();
    const getResponses = [
      { JobStatus: 'IN_PROGRESS' },
      { JobStatus: 'SUCCEEDED', ExpenseDocuments: [page1], NextToken: 'page-2' },
      { JobStatus: 'SUCCEEDED', ExpenseDocuments: [page2] },
    ];
    const send = jest.spyOn(client, 'send').mockImplementation(async (command) => {
      if (command instanceof StartExpenseAnalysisCommand) {
        return { JobId: 'job-1', $metadata: {} };
      }
      return { ...getResponses.shift(), $metadata: {} };
    });

    const analysis = await new TextractExpenseAnalyzer(client, { pollIntervalMs: 0 }).analyzeExpense(ref);

    expect(analysis).toEqual({
      summaryFields: [
        { type: 'VENDOR_NAME', label: undefined, value: 'Acme' },
        { type: 'TOTAL', label: undefined, value: '100.00' },
      ],
      lineItems: [],
    });
    expect(send).toHaveBeenCalledTimes(4);
    expect(send.mock.calls[0][0].input).toEqual({
      DocumentLocation: { S3Object: { Bucket: 'test-bucket', Name: 'invoice-A.pdf' } },
    });
    expect(send.mock.calls[1][0]).toBeInstanceOf(GetExpenseAnalysisCommand);
    expect(send.mock.calls[3][0].input).toEqual({ JobId: 'job-1', NextToken: 'page-2' });
  });

  it('fails when the job does not succeed', async () => {
    const client = createClient();
    jest.spyOn(client, 'send').mockImplementation(async (command) => {
      if (command instanceof StartExpenseAnalysisCommand) {
        return { JobId: 'job-1', $metadata: {} };
      }
      return { JobStatus: 'FAILED', StatusMessage: 'Unsupported document format', $metadata: {} };
    });

    await expect(new TextractExpenseAnalyzer(client, { pollIntervalMs: 0 }).analyzeExpense(ref))
      .rejects.toThrow('El trabajo job-1 de Textract terminó con estado FAILED: Unsupported document format');
  });

  it('fails when Textract returns no job id', async () => {
    const client = createClient();
    const send = jest.spyOn(client, 'send').mockImplementation(async () => ({ $metadata: {} }));

    await expect(new TextractExpenseAnalyzer(client, { pollIntervalMs: 0 }).analyzeExpense(ref))
      .rejects.toThrow('Textract no devolvió un JobId para StartExpenseAnalysis.');
    expect(send).toHaveBeenCalledTimes(1);
  });
});
