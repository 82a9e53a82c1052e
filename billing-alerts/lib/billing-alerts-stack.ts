import * as cdk from 'aws-cdk-lib/core';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as events from 'aws-cdk-lib/aws-events';
import * as eventsTargets from 'aws-cdk-lib/aws-events-targets';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as lambdaNode from 'aws-cdk-lib/aws-lambda-nodejs';
import * as logs from 'aws-cdk-lib/aws-logs';
import { Construct } from 'constructs';
import * as path from 'path';

import { AlarmNotifications } from '../../shared/lib/alarm-notifications';
import { lambdaLogGroupName, resourceName } from '../../shared/lib/naming';
import type { BillingAlertsConfig } from './billing-alerts-config';

export interface BillingAlertsStackProps extends cdk.StackProps {
  readonly config: BillingAlertsConfig;
}

/**
 * Billing Alerts Stack
 *
 * EventBridge schedule → Lambda → Cost Explorer (month-to-date costs)
 *                              → chat-ops webhook (Slack Block Kit message)
 *
 * A CloudWatch alarm on function errors notifies an SNS topic; subscribe
 * an address with `-c alertEmail=...`.
 */
export class BillingAlertsStack extends cdk.Stack {
  public readonly billingFunction: lambdaNode.NodejsFunction;
  public readonly schedule: events.Rule;
  public readonly errorAlarm: cloudwatch.Alarm;
  public readonly alarms: AlarmNotifications;

  constructor(scope: Construct, id: string, props: BillingAlertsStackProps) {
    super(scope, id, props);

    const { config } = props;
    const isProduction = config.environment === 'production';
    const functionName = resourceName(config.projectName, config.environment, 'billing-alert', 64);

    // =================================================================
    // Lambda - Billing Alert
    // =================================================================
    const environment: Record<string, string> = {
      WEBHOOK_URL: config.webhookUrl,
      MAX_SERVICES: String(config.maxServices),
      MIN_SERVICE_COST: String(config.minServiceCost),
      LOG_LEVEL: isProduction ? 'info' : 'debug',
    };
    if (config.alertThreshold !== undefined) {
      environment.ALERT_THRESHOLD = String(config.alertThreshold);
    }

    this.billingFunction = new lambdaNode.NodejsFunction(this, 'BillingAlertFunction', {
      functionName,
      runtime: lambda.Runtime.NODEJS_20_X,
      architecture: lambda.Architecture.ARM_64,
      entry: path.join(__dirname, '..', 'lambda', 'billing-alert.ts'),
      handler: 'handler',
      memorySize: 256,
      timeout: cdk.Duration.seconds(30),
      environment,
      description: `Posts month-to-date AWS costs to a webhook for ${config.projectName}`,
      logGroup: new logs.LogGroup(this, 'BillingAlertLogGroup', {
        logGroupName: lambdaLogGroupName(functionName),
        retention: isProduction ? logs.RetentionDays.ONE_MONTH : logs.RetentionDays.ONE_WEEK,
        removalPolicy: cdk.RemovalPolicy.DESTROY,
      }),
      bundling: {
        minify: true,
        sourceMap: true,
        // Provided by the Node.js 20 runtime
        externalModules: ['@aws-sdk/*'],
      },
    });

    // Cost Explorer has no resource-level permissions
    this.billingFunction.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ['ce:GetCostAndUsage'],
        resources: ['*'],
      })
    );

    // =================================================================
    // EventBridge Schedule
    // =================================================================
    this.schedule = new events.Rule(this, 'BillingAlertSchedule', {
      description: 'Triggers the billing alert Lambda',
      schedule: events.Schedule.expression(config.scheduleExpression),
      targets: [new eventsTargets.LambdaFunction(this.billingFunction, { retryAttempts: 2 })],
    });

    // =================================================================
    // Error Alarm
    // =================================================================
    this.alarms = new AlarmNotifications(this, 'Alarms', {
      displayName: 'Billing alert failures',
      alertEmail: config.alertEmail,
    });

    this.errorAlarm = new cloudwatch.Alarm(this, 'BillingAlertErrorAlarm', {
      alarmDescription: 'Billing alert Lambda failed to run',
      metric: this.billingFunction.metricErrors({
        period: cdk.Duration.minutes(5),
        statistic: 'Sum',
      }),
      threshold: 1,
      evaluationPeriods: 1,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_OR_EQUAL_TO_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });
    this.alarms.watch(this.errorAlarm);

    // =================================================================
    // Outputs
    // =================================================================
    new cdk.CfnOutput(this, 'FunctionName', {
      value: this.billingFunction.functionName,
      description: 'Billing alert Lambda function name',
    });

    new cdk.CfnOutput(this, 'InvokeCommand', {
      value: `aws lambda invoke --function-name ${this.billingFunction.functionName} --region ${this.region} /dev/stdout`,
      description: 'Send a billing alert now',
    });

    new cdk.CfnOutput(this, 'AlarmTopicArn', {
      value: this.alarms.topic.topicArn,
      description: 'SNS topic notified when the billing alert fails',
    });
  }
}
