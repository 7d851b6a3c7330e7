import * as cdk from 'aws-cdk-lib';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as sqs from 'aws-cdk-lib/aws-sqs';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as lambdaNode from 'aws-cdk-lib/aws-lambda-nodejs';
import * as lambdaEventSources from 'aws-cdk-lib/aws-lambda-event-sources';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import * as rds from 'aws-cdk-lib/aws-rds';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import { Construct } from 'constructs';
import * as path from 'path';

const DB_NAME = 'keepsake';

/** Placeholder-valued JSON secret; operators replace the values after deploy. */
function placeholderSecret(scope: Construct, id: string, secretName: string, keys: string[]): secretsmanager.Secret {
  const [generated, ...rest] = keys;
  return new secretsmanager.Secret(scope, id, {
    secretName,
    generateSecretString: {
      secretStringTemplate: JSON.stringify(Object.fromEntries(rest.map((key) => [key, 'replace-me']))),
      generateStringKey: generated ?? 'value',
      excludePunctuation: true,
      passwordLength: 32,
    },
  });
}

export class KeepsakeStack extends cdk.Stack {
  constructor(scope: Construct, id: string, props?: cdk.StackProps) {
    super(scope, id, props);

    // --- S3 bucket for uploaded WhatsApp media ---
    const mediaBucket = new s3.Bucket(this, 'MediaBucket', {
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      encryption: s3.BucketEncryption.S3_MANAGED,
      removalPolicy: cdk.RemovalPolicy.RETAIN,
    });

    // --- Job queue; the processor settles every job itself, so only crashed invocations reach the DLQ ---
    const dlq = new sqs.Queue(this, 'ProcessingDLQ', {
      queueName: 'keepsake-processing-dlq',
      retentionPeriod: cdk.Duration.days(14),
      encryption: sqs.QueueEncryption.SQS_MANAGED,
    });

    const processingQueue = new sqs.Queue(this, 'ProcessingQueue', {
      queueName: 'keepsake-processing-queue',
      visibilityTimeout: cdk.Duration.seconds(300),
      retentionPeriod: cdk.Duration.days(4),
      receiveMessageWaitTime: cdk.Duration.seconds(20),
      deadLetterQueue: {
        queue: dlq,
        maxReceiveCount: 1,
      },
      encryption: sqs.QueueEncryption.SQS_MANAGED,
    });

    // --- Provider credentials ---
    const openAiSecret = placeholderSecret(this, 'OpenAIApiKeySecret', 'keepsake/openai', ['OPENAI_API_KEY']);
    const mistralSecret = placeholderSecret(this, 'MistralApiKeySecret', 'keepsake/mistral', ['MISTRAL_API_KEY']);
    const twilioSecret = placeholderSecret(this, 'TwilioSecret', 'keepsake/twilio', [
      'TWILIO_AUTH_TOKEN',
      'TWILIO_ACCOUNT_SID',
      'TWILIO_WHATSAPP_NUMBER',
    ]);

    // --- VPC; the NAT gateway lets the Lambdas reach Twilio and the model APIs ---
    const vpc = new ec2.Vpc(this, 'KeepsakeVpc', {
      maxAzs: 2,
      natGateways: 1,
    });

    const dbSecurityGroup = new ec2.SecurityGroup(this, 'DbSecurityGroup', {
      vpc,
      description: 'Keepsake RDS security group',
      allowAllOutbound: true,
    });

    // --- RDS PostgreSQL with pgvector (packages/database/sql is applied with `npm run db:migrate`) ---
    const dbInstance = new rds.DatabaseInstance(this, 'KeepsakeDb', {
      engine: rds.DatabaseInstanceEngine.postgres({
        version: rds.PostgresEngineVersion.VER_16_3,
      }),
      instanceType: ec2.InstanceType.of(ec2.InstanceClass.T3, ec2.InstanceSize.MICRO),
      vpc,
      vpcSubnets: { subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS },
      securityGroups: [dbSecurityGroup],
      credentials: rds.Credentials.fromGeneratedSecret('keepsakeadmin', {
        secretName: 'keepsake/db-credentials',
      }),
      databaseName: DB_NAME,
      allocatedStorage: 20,
      maxAllocatedStorage: 100,
      removalPolicy: cdk.RemovalPolicy.RETAIN,
    });

    const dbSecret = dbInstance.secret;
    if (!dbSecret) throw new Error('RDS instance was created without a credentials secret');

    const databaseEnv = {
      DB_SECRET_ARN: dbSecret.secretArn,
      DB_HOST: dbInstance.dbInstanceEndpointAddress,
      DB_NAME,
    };

    const bundling: lambdaNode.BundlingOptions = {
      externalModules: ['@aws-sdk/*', 'pg-native'],
    };

    // --- Lambda: Webhook (Twilio post -> job row -> SQS) ---
    const webhookLambda = new lambdaNode.NodejsFunction(this, 'WebhookLambda', {
      functionName: 'keepsake-webhook',
      entry: path.join(__dirname, '../../ingestion/src/index.ts'),
      handler: 'handler',
      runtime: lambda.Runtime.NODEJS_20_X,
      timeout: cdk.Duration.seconds(15),
      memorySize: 256,
      vpc,
      vpcSubnets: { subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS },
      environment: {
        ...databaseEnv,
        PROCESSING_QUEUE_URL: processingQueue.queueUrl,
        TWILIO_SECRET_ARN: twilioSecret.secretArn,
      },
      tracing: lambda.Tracing.ACTIVE,
      bundling,
    });

    processingQueue.grantSendMessages(webhookLambda);
    twilioSecret.grantRead(webhookLambda);
    dbSecret.grantRead(webhookLambda);

    const webhookUrl = webhookLambda.addFunctionUrl({
      authType: lambda.FunctionUrlAuthType.NONE,
    });

    // --- Lambda: Processor (SQS -> models -> pgvector -> WhatsApp reply) ---
    const processorLambda = new lambdaNode.NodejsFunction(this, 'ProcessorLambda', {
      functionName: 'keepsake-processor',
      entry: path.join(__dirname, '../../processor/src/index.ts'),
      handler: 'handler',
      runtime: lambda.Runtime.NODEJS_20_X,
      timeout: cdk.Duration.seconds(300),
      memorySize: 512,
      vpc,
      vpcSubnets: { subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS },
      environment: {
        ...databaseEnv,
        MEDIA_BUCKET_NAME: mediaBucket.bucketName,
        OPENAI_SECRET_ARN: openAiSecret.secretArn,
        MISTRAL_SECRET_ARN: mistralSecret.secretArn,
        TWILIO_SECRET_ARN: twilioSecret.secretArn,
      },
      tracing: lambda.Tracing.ACTIVE,
      retryAttempts: 0,
      bundling,
    });

    processingQueue.grantConsumeMessages(processorLambda);
    mediaBucket.grantReadWrite(processorLambda);
    openAiSecret.grantRead(processorLambda);
    mistralSecret.grantRead(processorLambda);
    twilioSecret.grantRead(processorLambda);
    dbSecret.grantRead(processorLambda);

    dbInstance.connections.allowDefaultPortFrom(webhookLambda, 'Webhook to RDS');
    dbInstance.connections.allowDefaultPortFrom(processorLambda, 'Processor to RDS');

    processorLambda.addEventSource(
      new lambdaEventSources.SqsEventSource(processingQueue, { batchSize: 1 })
    );

    // --- Outputs ---
    new cdk.CfnOutput(this, 'WebhookUrl', {
      value: `${webhookUrl.url}webhook`,
      description: 'Twilio WhatsApp "when a message comes in" URL',
      exportName: 'Keepsake-WebhookUrl',
    });
    new cdk.CfnOutput(this, 'MediaBucketName', {
      value: mediaBucket.bucketName,
      description: 'S3 bucket for media uploads',
      exportName: 'Keepsake-MediaBucketName',
    });
    new cdk.CfnOutput(this, 'ProcessingQueueUrl', {
      value: processingQueue.queueUrl,
      description: 'SQS processing queue URL',
      exportName: 'Keepsake-ProcessingQueueUrl',
    });
    new cdk.CfnOutput(this, 'DLQUrl', {
      value: dlq.queueUrl,
      description: 'Dead letter queue URL',
      exportName: 'Keepsake-DLQUrl',
    });
  }
}
