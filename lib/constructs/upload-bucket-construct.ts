import { RemovalPolicy } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as s3 from 'aws-cdk-lib/aws-s3';

export interface UploadBucketProps {
    removalPolicy?: RemovalPolicy;
}

export class UploadBucketConstruct extends Construct {
    public readonly bucket: s3.Bucket;

    constructor(scope: Construct, id: string, props: UploadBucketProps = {}) {
        super(scope, id);

        const removalPolicy = props.removalPolicy ?? RemovalPolicy.DESTROY;

        this.bucket = new s3.Bucket(this, 'invoice-upload-bucket', {
            removalPolicy,
            autoDeleteObjects: removalPolicy === RemovalPolicy.DESTROY,
            encryption: s3.BucketEncryption.S3_MANAGED,
            blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
            enforceSSL: true,
        });
    }
}
