import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as sns from 'aws-cdk-lib/aws-sns';
import * as sqs from 'aws-cdk-lib/aws-sqs';
import * as eventsources from 'aws-cdk-lib/aws-lambda-event-sources';
import * as subscriptions from 'aws-cdk-lib/aws-sns-subscriptions';
import * as events from 'aws-cdk-lib/aws-events';
import * as targets from 'aws-cdk-lib/aws-events-targets';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as path from 'path';

export interface BlogAutomationStackProps extends cdk.StackProps {
  environment?: string;
  alertEmail?: string;
  bedrockModelId?: string;
  pexelsApiKey?: string;
  unsplashAccessKey?: string;
  /** Overrides the packaged Lambda code, mainly for synthesis in tests. */
  lambdaCode?: lambda.Code;
}

export class BlogAutomationStack extends cdk.Stack {
  public readonly tables: dynamodb.Table[] = [];
  public readonly automationFunction: lambda.Function;
  public readonly alertTopic: sns.Topic;
  public readonly runQueue: sqs.Queue;

  constructor(scope: Construct, id: string, props: BlogAutomationStackProps = {}) {
    super(scope, id, props);

    const environment = props.environment ?? 'development';
    const prefix = `blog-automation-${environment}`;

    const table = (constructId: string, name: string): dynamodb.Table => {
      const created = new dynamodb.Table(this, constructId, {
        tableName: `${prefix}-${name}`,
        partitionKey: { name: 'id', type: dynamodb.AttributeType.STRING },
        billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
        encryption: dynamodb.TableEncryption.AWS_MANAGED,
        pointInTimeRecovery: true,
        removalPolicy: cdk.RemovalPolicy.RETAIN,
      });
      this.tables.push(created);
      return created;
    };

    const blogsTable = table('BlogsTable', 'blogs');
    const rulesTable = table('AutomationRulesTable', 'rules');
    const topicsTable = table('TopicsTable', 'topics');
    const articlesTable = table('ArticlesTable', 'articles');
    const metricsTable = table('ContentMetricsTable', 'metrics');
    const workflowRunsTable = table('WorkflowRunsTable', 'workflow-runs');
    const notificationsTable = table('NotificationsTable', 'notifications');

    // Topic pool per blog, oldest first
    topicsTable.addGlobalSecondaryIndex({
      indexName: 'BlogIdIndex',
      partitionKey: { name: 'blogId', type: dynamodb.AttributeType.STRING },
      sortKey: { name: 'createdAt', type: dynamodb.AttributeType.STRING },
    });

    // Publications per blog, used by author rotation
    articlesTable.addGlobalSecondaryIndex({
      indexName: 'BlogIdPublishedAtIndex',
      partitionKey: { name: 'blogId', type: dynamodb.AttributeType.STRING },
      sortKey: { name: 'publishedAt', type: dynamodb.AttributeType.STRING },
    });

    workflowRunsTable.addGlobalSecondaryIndex({
      indexName: 'RuleIdIndex',
      partitionKey: { name: 'ruleId', type: dynamodb.AttributeType.STRING },
      sortKey: { name: 'startedAt', type: dynamodb.AttributeType.STRING },
    });

    const imageBucket = new s3.Bucket(this, 'ImageBucket', {
      encryption: s3.BucketEncryption.S3_MANAGED,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      lifecycleRules: [
        {
          id: 'TransitionToIA',
          transitions: [
            {
              storageClass: s3.StorageClass.INFREQUENT_ACCESS,
              transitionAfter: cdk.Duration.days(30),
            },
          ],
        },
      ],
      removalPolicy: cdk.RemovalPolicy.RETAIN,
    });

    this.alertTopic = new sns.Topic(this, 'AlertTopic', {
      topicName: `${prefix}-alerts`,
      displayName: 'Blog automation alerts',
    });
    if (props.alertEmail) {
      this.alertTopic.addSubscription(new subscriptions.EmailSubscription(props.alertEmail));
    }

    // One message per rule run; a run queues its successor when it completes.
    // Failed messages go straight to the DLQ.
    this.runQueue = new sqs.Queue(this, 'RunQueue', {
      queueName: `${prefix}-runs`,
      visibilityTimeout: cdk.Duration.minutes(15),
      deadLetterQueue: {
        queue: new sqs.Queue(this, 'RunDLQ', {
          queueName: `${prefix}-runs-dlq`,
          retentionPeriod: cdk.Duration.days(14),
        }),
        maxReceiveCount: 1,
      },
    });

    const environmentVariables: Record<string, string> = {
      BLOGS_TABLE_NAME: blogsTable.tableName,
      RULES_TABLE_NAME: rulesTable.tableName,
      TOPICS_TABLE_NAME: topicsTable.tableName,
      ARTICLES_TABLE_NAME: articlesTable.tableName,
      METRICS_TABLE_NAME: metricsTable.tableName,
      WORKFLOW_RUNS_TABLE_NAME: workflowRunsTable.tableName,
      NOTIFICATIONS_TABLE_NAME: notificationsTable.tableName,
      IMAGE_BUCKET_NAME: imageBucket.bucketName,
      RUN_QUEUE_URL: this.runQueue.queueUrl,
      ALERT_TOPIC_ARN: this.alertTopic.topicArn,
      NODE_ENV: environment === 'production' ? 'production' : 'development',
    };
    if (props.bedrockModelId) {
      environmentVariables.BEDROCK_MODEL_ID = props.bedrockModelId;
    }
    if (props.pexelsApiKey) {
      environmentVariables.PEXELS_API_KEY = props.pexelsApiKey;
    }
    if (props.unsplashAccessKey) {
      environmentVariables.UNSPLASH_ACCESS_KEY = props.unsplashAccessKey;
    }

    // Compiled output: dist/lambda and dist/config sit next to dist/lib
    const code = props.lambdaCode ?? lambda.Code.fromAsset(path.join(__dirname, '..'), {
      exclude: ['**/*.ts', 'bin', 'lib', 'test', 'cdk.out'],
    });

    this.automationFunction = new lambda.Function(this, 'AutomationFunction', {
      runtime: lambda.Runtime.NODEJS_20_X,
      handler: 'lambda/automation-handler.handler',
      code,
      timeout: cdk.Duration.minutes(15),
      memorySize: 1024,
      environment: environmentVariables,
    });

    for (const created of this.tables) {
      created.grantReadWriteData(this.automationFunction);
    }
    imageBucket.grantReadWrite(this.automationFunction);
    this.alertTopic.grantPublish(this.automationFunction);
    this.runQueue.grantSendMessages(this.automationFunction);

    this.automationFunction.addEventSource(new eventsources.SqsEventSource(this.runQueue, {
      batchSize: 1,
    }));

    this.automationFunction.addToRolePolicy(new iam.PolicyStatement({
      effect: iam.Effect.ALLOW,
      actions: ['bedrock:InvokeModel'],
      resources: ['*'],
    }));

    this.automationFunction.addToRolePolicy(new iam.PolicyStatement({
      effect: iam.Effect.ALLOW,
      actions: ['cloudwatch:PutMetricData'],
      resources: ['*'],
    }));

    // Daily sweep queues the first run of every active automation rule
    new events.Rule(this, 'DailyAutomationRule', {
      schedule: events.Schedule.cron({
        minute: '0',
        hour: '6',
        day: '*',
        month: '*',
        year: '*',
      }),
      targets: [new targets.LambdaFunction(this.automationFunction)],
    });

    new cdk.CfnOutput(this, 'AutomationFunctionName', {
      value: this.automationFunction.functionName,
    });
    new cdk.CfnOutput(this, 'ImageBucketName', {
      value: imageBucket.bucketName,
    });
    new cdk.CfnOutput(this, 'RunQueueUrl', {
      value: this.runQueue.queueUrl,
    });
    new cdk.CfnOutput(this, 'AlertTopicArn', {
      value: this.alertTopic.topicArn,
    });
  }
}
