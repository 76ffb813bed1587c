import { Construct } from "constructs";
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as iam from 'aws-cdk-lib/aws-iam';

export interface CliPolicyProps {
    uploadBucket: s3.IBucket;
}

/**
 * Permisos mínimos para ejecutar el CLI: subir la factura y lanzar los trabajos de Textract.
 * Textract lee el objeto con las credenciales de quien lanza el trabajo, por eso s3:GetObject.
 */
export class CliPolicyConstruct extends Construct {
    public readonly policy: iam.ManagedPolicy;

    constructor(scope: Construct, id: string, props: CliPolicyProps) {
        super(scope, id);

        this.policy = new iam.ManagedPolicy(this, 'invoice-extractor-cli-policy', {
            description: 'Permisos del CLI de extracción de facturas',
            statements: [
                new iam.PolicyStatement({
                    actions: ['s3:PutObject', 's3:GetObject'],
                    resources: [props.uploadBucket.arnForObjects('*')]
                }),
                new iam.PolicyStatement({
                    actions: [
                        'textract:StartExpenseAnalysis',
                        'textract:GetExpenseAnalysis',
                        'textract:StartDocumentTextDetection',
                        'textract:GetDocumentTextDetection'
                    ],
                    resources: ['*']
                }),
            ],
        });
    }
}
