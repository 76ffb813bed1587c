import { Construct } from 'constructs';
import { Stack, StackProps, CfnOutput, RemovalPolicy } from 'aws-cdk-lib';

import { CliPolicyConstruct } from './constructs/cli-policy-construct';
import { UploadBucketConstruct } from './constructs/upload-bucket-construct';

export interface InvoiceExtractorStackProps extends StackProps {
  bucketRemovalPolicy?: RemovalPolicy;
}

export class InvoiceExtractorStack extends Stack {

  private uploadBucket: UploadBucketConstruct;
  private cliPolicy: CliPolicyConstruct;

  constructor(scope: Construct, id: string, props: InvoiceExtractorStackProps = {}) {
    super(scope, id, props);

    //S3
    this.uploadBucket = new UploadBucketConstruct(this, 'upload-bucket', {
      removalPolicy: props.bucketRemovalPolicy
    });

    //IAM
    this.cliPolicy = new CliPolicyConstruct(this, 'cli-policy', {
      uploadBucket: this.uploadBucket.bucket
    });

    new CfnOutput(this, 'UploadBucketName', {
      value: this.uploadBucket.bucket.bucketName,
      description: 'Bucket S3 para INVOICE_BUCKET_NAME.',
    });
    new CfnOutput(this, 'CliPolicyArn', {
      value: this.cliPolicy.policy.managedPolicyArn,
      description: 'Política IAM a asignar al usuario o rol que ejecuta el CLI.',
    });
  }
}
