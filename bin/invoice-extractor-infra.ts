#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib';
import { InvoiceExtractorStack } from '../lib/invoice-extractor-stack';

const app = new cdk.App();
new InvoiceExtractorStack(app, 'InvoiceExtractorStack');
