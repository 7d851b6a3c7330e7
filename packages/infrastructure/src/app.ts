#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { KeepsakeStack } from './keepsake-stack';

const app = new cdk.App();

new KeepsakeStack(app, 'KeepsakeStack', {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION || 'us-east-1',
  },
  description: 'Keepsake: WhatsApp capture bot (webhook, job queue, processor, pgvector store)',
});
