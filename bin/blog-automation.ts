#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { BlogAutomationStack } from '../lib/blog-automation-stack';

const app = new cdk.App();

const environment: string = app.node.tryGetContext('environment') ?? 'development';
const account = process.env.CDK_DEFAULT_ACCOUNT;
const region = process.env.CDK_DEFAULT_REGION || 'us-east-1';

const stackNames: Record<string, string> = {
  development: 'BlogAutomation-Dev',
  staging: 'BlogAutomation-Staging',
  production: 'BlogAutomation-Prod',
};

const stackName = stackNames[environment];
if (!stackName) {
  throw new Error(`Unknown environment: ${environment}`);
}

new BlogAutomationStack(app, stackName, {
  env: { account, region },
  description: `Blog automation workflow - ${environment} environment`,
  tags: {
    Environment: environment,
    Project: 'BlogAutomation',
    ManagedBy: 'CDK',
  },
  environment,
  alertEmail: process.env.ALERT_EMAIL,
  bedrockModelId: process.env.BEDROCK_MODEL_ID,
  pexelsApiKey: process.env.PEXELS_API_KEY,
  unsplashAccessKey: process.env.UNSPLASH_ACCESS_KEY,
});

app.synth();
