import * as cdk from 'aws-cdk-lib/core';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as elbv2 from 'aws-cdk-lib/aws-elasticloadbalancingv2';
import * as rds from 'aws-cdk-lib/aws-rds';
import * as wafv2 from 'aws-cdk-lib/aws-wafv2';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import * as route53 from 'aws-cdk-lib/aws-route53';
import * as route53Targets from 'aws-cdk-lib/aws-route53-targets';
import { Construct } from 'constructs';

import { AlarmNotifications } from '../../shared/lib/alarm-notifications';
import { ConfigurationError } from '../../shared/lib/errors';
import { resourceName } from '../../shared/lib/naming';
import type { TierConfig } from '../../shared/lib/tier-config';
import { TierNetwork } from '../../shared/lib/tier-network';
import { WebFleet } from '../../shared/lib/web-fleet';

/**
 * Port the application tier listens on
 */
const APP_PORT = 8080;

export interface Aws3TierAppStackProps extends cdk.StackProps {
  readonly config: TierConfig;
}

/**
 * AWS 3-Tier Application Stack
 *
 * Architecture:
 * ┌─────────────────────────────────────────────────────────────────┐
 * │                     PRESENTATION TIER                           │
 * │  Route 53 → WAF → ALB (public) → nginx ASG (web subnet)         │
 * └─────────────────────────────────────────────────────────────────┘
 *                              │
 * ┌─────────────────────────────────────────────────────────────────┐
 * │                     APPLICATION TIER                            │
 * │  Internal ALB → FastAPI ASG (app subnet)                        │
 * └─────────────────────────────────────────────────────────────────┘
 *                              │
 * ┌─────────────────────────────────────────────────────────────────┐
 * │                        DATA TIER                                │
 * │  PostgreSQL RDS (isolated subnet)                               │
 * └─────────────────────────────────────────────────────────────────┘
 */
export class Aws3TierAppStack extends cdk.Stack {
  // Public references
  public readonly network: TierNetwork;
  public readonly database: rds.DatabaseInstance;
  public readonly databaseSecret: secretsmanager.Secret;
  public readonly webFleet: WebFleet;
  public readonly appFleet: WebFleet;
  public readonly alb: elbv2.ApplicationLoadBalancer;
  public readonly internalAlb: elbv2.ApplicationLoadBalancer;
  public readonly webAcl: wafv2.CfnWebACL;
  public readonly alarms: AlarmNotifications;

  constructor(scope: Construct, id: string, props: Aws3TierAppStackProps) {
    super(scope, id, props);

    const { config } = props;
    const isProduction = config.environment === 'production';

    if (config.maxAzs < 2) {
      throw new ConfigurationError('Invalid tier configuration', [
        'maxAzs: load balancers and RDS subnet groups need at least 2 AZs',
      ]);
    }

    // ================================================================
    // VPC with 3-Tier Subnet Architecture
    // ================================================================
    this.network = new TierNetwork(this, 'Network', {
      config,
      tiers: [
        { name: 'Public', subnetType: ec2.SubnetType.PUBLIC },
        { name: 'Web', subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS },
        { name: 'App', subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS },
        { name: 'Database', subnetType: ec2.SubnetType.PRIVATE_ISOLATED },
      ],
    });
    const vpc = this.network.vpc;

    // ================================================================
    // Security Groups
    // ================================================================

    // ALB Security Group (public-facing)
    const albSg = new ec2.SecurityGroup(this, 'AlbSecurityGroup', {
      vpc,
      description: 'Security group for ALB - accepts HTTP/HTTPS from internet',
      allowAllOutbound: true,
    });
    albSg.addIngressRule(ec2.Peer.anyIpv4(), ec2.Port.tcp(80), 'Allow HTTP');
    albSg.addIngressRule(ec2.Peer.anyIpv4(), ec2.Port.tcp(443), 'Allow HTTPS');

    // Web Security Group (presentation tier)
    const webSg = new ec2.SecurityGroup(this, 'WebSecurityGroup', {
      vpc,
      description: 'Security group for web tier - accepts traffic from ALB only',
      allowAllOutbound: true,
    });
    webSg.addIngressRule(albSg, ec2.Port.tcp(80), 'Allow from ALB');

    // Internal ALB Security Group
    const internalAlbSg = new ec2.SecurityGroup(this, 'InternalAlbSecurityGroup', {
      vpc,
      description: 'Security group for internal ALB - accepts traffic from web tier only',
      allowAllOutbound: true,
    });
    internalAlbSg.addIngressRule(webSg, ec2.Port.tcp(80), 'Allow from web tier');

    // App Security Group (application tier)
    const appSg = new ec2.SecurityGroup(this, 'AppSecurityGroup', {
      vpc,
      description: 'Security group for app tier - accepts traffic from internal ALB only',
      allowAllOutbound: true,
    });
    appSg.addIngressRule(internalAlbSg, ec2.Port.tcp(APP_PORT), 'Allow from internal ALB');

    // RDS Security Group (data tier)
    const rdsSg = new ec2.SecurityGroup(this, 'RdsSecurityGroup', {
      vpc,
      description: 'Security group for RDS - accepts traffic from app tier only',
      allowAllOutbound: false,
    });
    rdsSg.addIngressRule(appSg, ec2.Port.tcp(5432), 'Allow PostgreSQL from app tier');

    // ================================================================
    // RDS PostgreSQL (Data Tier)
    // ================================================================

    // Database credentials in Secrets Manager
    this.databaseSecret = new secretsmanager.Secret(this, 'DbSecret', {
      secretName: `${this.stackName}/database/credentials`,
      description: 'PostgreSQL database credentials',
      generateSecretString: {
        secretStringTemplate: JSON.stringify({ username: 'appuser' }),
        generateStringKey: 'password',
        excludePunctuation: true,
        passwordLength: 32,
      },
    });

    this.database = new rds.DatabaseInstance(this, 'Database', {
      engine: rds.DatabaseInstanceEngine.postgres({
        version: rds.PostgresEngineVersion.VER_16_4,
      }),
      instanceType: new ec2.InstanceType(config.dbInstanceType),
      vpc,
      vpcSubnets: this.network.subnetsFor('Database'),
      securityGroups: [rdsSg],
      credentials: rds.Credentials.fromSecret(this.databaseSecret),
      databaseName: 'appdb',
      allocatedStorage: config.dbAllocatedStorage,
      maxAllocatedStorage: config.dbAllocatedStorage * 5,
      storageType: rds.StorageType.GP3,
      storageEncrypted: true,
      multiAz: config.dbMultiAz,
      autoMinorVersionUpgrade: true,
      backupRetention: cdk.Duration.days(7),
      deletionProtection: isProduction,
      removalPolicy: isProduction ? cdk.RemovalPolicy.SNAPSHOT : cdk.RemovalPolicy.DESTROY,
      publiclyAccessible: false,
      // Performance Insights
      enablePerformanceInsights: true,
      performanceInsightRetention: rds.PerformanceInsightRetention.DEFAULT,
    });

    // ================================================================
    // Application Tier (internal ALB → FastAPI)
    // ================================================================
    this.internalAlb = new elbv2.ApplicationLoadBalancer(this, 'InternalAlb', {
      vpc,
      internetFacing: false,
      securityGroup: internalAlbSg,
      vpcSubnets: this.network.subnetsFor('App'),
    });

    this.appFleet = new WebFleet(this, 'AppFleet', {
      vpc,
      vpcSubnets: this.network.subnetsFor('App'),
      securityGroup: appSg,
      instanceType: config.appInstanceType,
      userData: this.createAppUserData(
        this.databaseSecret.secretArn,
        this.database.instanceEndpoint.hostname
      ),
      minCapacity: config.minCapacity,
      desiredCapacity: config.desiredCapacity,
      maxCapacity: config.maxCapacity,
      roleDescription: 'Role for app tier with SSM, CloudWatch, and Secrets Manager access',
    });
    this.appFleet.node.addDependency(this.database);

    // Allow reading database secret
    this.databaseSecret.grantRead(this.appFleet.role);

    const internalListener = this.internalAlb.addListener('InternalHttpListener', {
      port: 80,
      protocol: elbv2.ApplicationProtocol.HTTP,
      open: false,
    });

    const appTargets = internalListener.addTargets('AppTargets', {
      port: APP_PORT,
      protocol: elbv2.ApplicationProtocol.HTTP,
      targets: [this.appFleet.autoScalingGroup],
      healthCheck: {
        path: '/health',
        interval: cdk.Duration.seconds(30),
        timeout: cdk.Duration.seconds(10),
        healthyThresholdCount: 2,
        unhealthyThresholdCount: 5,
        healthyHttpCodes: '200',
      },
      deregistrationDelay: cdk.Duration.seconds(30),
    });

    // ================================================================
    // Presentation Tier (public ALB → nginx)
    // ================================================================
    this.webFleet = new WebFleet(this, 'WebFleet', {
      vpc,
      vpcSubnets: this.network.subnetsFor('Web'),
      securityGroup: webSg,
      instanceType: config.instanceType,
      userData: this.createWebUserData(this.internalAlb.loadBalancerDnsName),
      minCapacity: config.minCapacity,
      desiredCapacity: config.desiredCapacity,
      maxCapacity: config.maxCapacity,
      roleDescription: 'Role for web tier with SSM and CloudWatch access',
    });

    this.alb = new elbv2.ApplicationLoadBalancer(this, 'Alb', {
      vpc,
      internetFacing: true,
      securityGroup: albSg,
      vpcSubnets: this.network.subnetsFor('Public'),
    });

    const listener = this.alb.addListener('HttpListener', {
      port: 80,
      protocol: elbv2.ApplicationProtocol.HTTP,
    });

    const webTargets = listener.addTargets('WebTargets', {
      port: 80,
      protocol: elbv2.ApplicationProtocol.HTTP,
      targets: [this.webFleet.autoScalingGroup],
      healthCheck: {
        path: '/health',
        interval: cdk.Duration.seconds(30),
        timeout: cdk.Duration.seconds(10),
        healthyThresholdCount: 2,
        unhealthyThresholdCount: 5,
        healthyHttpCodes: '200',
      },
      deregistrationDelay: cdk.Duration.seconds(30),
    });

    // ================================================================
    // WAF Web ACL
    // ================================================================
    const wafName = resourceName(config.projectName, config.environment, 'waf');
    this.webAcl = new wafv2.CfnWebACL(this, 'WebAcl', {
      name: wafName,
      description: 'WAF for 3-Tier Application',
      scope: 'REGIONAL',
      defaultAction: { allow: {} },
      visibilityConfig: {
        cloudWatchMetricsEnabled: true,
        metricName: wafName,
        sampledRequestsEnabled: true,
      },
      rules: [
        this.managedRule('AWSManagedRulesCommonRuleSet', 1, 'CommonRuleSet'),
        this.managedRule('AWSManagedRulesSQLiRuleSet', 2, 'SQLiRuleSet'),
        {
          name: 'RateLimitRule',
          priority: 3,
          action: { block: {} },
          statement: {
            rateBasedStatement: {
              limit: 2000,
              aggregateKeyType: 'IP',
            },
          },
          visibilityConfig: {
            cloudWatchMetricsEnabled: true,
            metricName: 'RateLimit',
            sampledRequestsEnabled: true,
          },
        },
      ],
    });

    // Associate WAF with ALB
    new wafv2.CfnWebACLAssociation(this, 'WafAlbAssociation', {
      resourceArn: this.alb.loadBalancerArn,
      webAclArn: this.webAcl.attrArn,
    });

    // ================================================================
    // Alarms
    // ================================================================
    this.alarms = new AlarmNotifications(this, 'Alarms', {
      displayName: `${config.projectName} 3-tier alarms`,
      alertEmail: config.alertEmail,
    });
    this.alarms.watch(this.unhealthyHostsAlarm('WebUnhealthyHostsAlarm', webTargets, 'Web tier'));
    this.alarms.watch(this.unhealthyHostsAlarm('AppUnhealthyHostsAlarm', appTargets, 'App tier'));
    this.alarms.watch(
      new cloudwatch.Alarm(this, 'DatabaseCpuAlarm', {
        alarmDescription: 'RDS PostgreSQL CPU above 80%',
        metric: this.database.metricCPUUtilization({ period: cdk.Duration.minutes(5) }),
        threshold: 80,
        evaluationPeriods: 3,
        comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      })
    );

    // ================================================================
    // Route 53 (Optional)
    // ================================================================
    if (config.domainName && config.hostedZoneId) {
      const hostedZone = route53.HostedZone.fromHostedZoneAttributes(this, 'HostedZone', {
        hostedZoneId: config.hostedZoneId,
        zoneName: config.domainName,
      });

      new route53.ARecord(this, 'AppAliasRecord', {
        zone: hostedZone,
        recordName: `app.${config.domainName}`,
        target: route53.RecordTarget.fromAlias(
          new route53Targets.LoadBalancerTarget(this.alb)
        ),
      });
    }

    // ================================================================
    // Outputs
    // ================================================================
    new cdk.CfnOutput(this, 'LoadBalancerUrl', {
      value: `http://${this.alb.loadBalancerDnsName}`,
      description: 'Application URL (public ALB)',
    });

    new cdk.CfnOutput(this, 'InternalLoadBalancerDns', {
      value: this.internalAlb.loadBalancerDnsName,
      description: 'Internal ALB DNS name (app tier)',
    });

    new cdk.CfnOutput(this, 'DatabaseEndpoint', {
      value: this.database.instanceEndpoint.hostname,
      description: 'RDS PostgreSQL endpoint',
    });

    new cdk.CfnOutput(this, 'DatabaseSecretArn', {
      value: this.databaseSecret.secretArn,
      description: 'Database credentials secret ARN',
    });

    new cdk.CfnOutput(this, 'WebAclArn', {
      value: this.webAcl.attrArn,
      description: 'WAF Web ACL ARN',
    });

    new cdk.CfnOutput(this, 'AlarmTopicArn', {
      value: this.alarms.topic.topicArn,
      description: 'SNS topic notified by the stack alarms',
    });
  }

  private unhealthyHostsAlarm(
    id: string,
    targetGroup: elbv2.ApplicationTargetGroup,
    tier: string
  ): cloudwatch.Alarm {
    return new cloudwatch.Alarm(this, id, {
      alarmDescription: `${tier} targets failing the ALB health check`,
      metric: targetGroup.metrics.unhealthyHostCount({
        period: cdk.Duration.minutes(1),
        statistic: 'Maximum',
      }),
      threshold: 1,
      evaluationPeriods: 3,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_OR_EQUAL_TO_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });
  }

  private managedRule(
    name: string,
    priority: number,
    metricName: string
  ): wafv2.CfnWebACL.RuleProperty {
    return {
      name,
      priority,
      overrideAction: { none: {} },
      statement: {
        managedRuleGroupStatement: {
          vendorName: 'AWS',
          name,
        },
      },
      visibilityConfig: {
        cloudWatchMetricsEnabled: true,
        metricName,
        sampledRequestsEnabled: true,
      },
    };
  }

  /**
   * nginx reverse proxy: static landing page, /api/ forwarded to the app tier
   */
  private createWebUserData(internalAlbDns: string): ec2.UserData {
    const userData = ec2.UserData.forLinux();
    userData.addCommands(
      'set -euo pipefail',
      'exec > >(tee /var/log/user-data.log) 2>&1',
      '',
      'dnf install -y nginx',
      '',
      'cat > /etc/nginx/default.d/app.conf << NGINXEOF',
      'location = /health {',
      '    default_type application/json;',
      '    return 200 \'{"status":"healthy","tier":"web"}\';',
      '}',
      '',
      'location /api/ {',
      `    proxy_pass http://${internalAlbDns}/;`,
      '    proxy_set_header Host \\$host;',
      '    proxy_set_header X-Forwarded-For \\$proxy_add_x_forwarded_for;',
      '    proxy_set_header X-Forwarded-Proto \\$scheme;',
      '}',
      'NGINXEOF',
      '',
      'cat > /usr/share/nginx/html/index.html << \'HTMLEOF\'',
      '<!DOCTYPE html>',
      '<html lang="en"><head><meta charset="UTF-8"><title>AWS 3-Tier</title></head>',
      '<body><h1>AWS 3-Tier Application</h1><p>ALB → nginx → internal ALB → FastAPI → PostgreSQL</p>',
      '<p><a href="/api/">/api/</a> · <a href="/api/health">/api/health</a></p></body></html>',
      'HTMLEOF',
      '',
      'systemctl enable --now nginx',
    );
    return userData;
  }

  /**
   * FastAPI service on APP_PORT with PostgreSQL credentials from Secrets Manager
   */
  private createAppUserData(secretArn: string, dbHost: string): ec2.UserData {
    const userData = ec2.UserData.forLinux();
    userData.addCommands(
      'set -euo pipefail',
      'exec > >(tee /var/log/user-data.log) 2>&1',
      '',
      'dnf install -y python3 python3-pip jq',
      'python3 -m venv /opt/app/venv',
      '/opt/app/venv/bin/pip install --upgrade pip',
      '/opt/app/venv/bin/pip install fastapi "uvicorn[standard]" asyncpg',
      '',
      '# Database credentials from Secrets Manager',
      `SECRET_ARN="${secretArn}"`,
      'TOKEN=$(curl -s -X PUT http://169.254.169.254/latest/api/token -H "X-aws-ec2-metadata-token-ttl-seconds: 300")',
      'REGION=$(curl -s -H "X-aws-ec2-metadata-token: $TOKEN" http://169.254.169.254/latest/meta-data/placement/region)',
      'SECRET_JSON=$(aws secretsmanager get-secret-value --secret-id "$SECRET_ARN" --region "$REGION" --query SecretString --output text)',
      'cat > /opt/app/app.env << EOF',
      `DB_HOST=${dbHost}`,
      'DB_PORT=5432',
      'DB_NAME=appdb',
      'DB_USER=$(echo "$SECRET_JSON" | jq -r .username)',
      'DB_PASSWORD=$(echo "$SECRET_JSON" | jq -r .password)',
      'EOF',
      'chmod 600 /opt/app/app.env',
      '',
      'cat > /opt/app/main.py << \'PYEOF\'',
      this.getAppCode(),
      'PYEOF',
      '',
      'cat > /etc/systemd/system/app.service << EOF',
      '[Unit]',
      'Description=3-Tier Application Service',
      'After=network.target',
      '',
      '[Service]',
      'WorkingDirectory=/opt/app',
      'EnvironmentFile=/opt/app/app.env',
      `ExecStart=/opt/app/venv/bin/uvicorn main:app --host 0.0.0.0 --port ${APP_PORT} --workers 2`,
      'Restart=always',
      'RestartSec=5',
      '',
      '[Install]',
      'WantedBy=multi-user.target',
      'EOF',
      '',
      'systemctl daemon-reload',
      'systemctl enable --now app.service',
    );
    return userData;
  }

  /**
   * Application tier service (embedded in user data)
   */
  private getAppCode(): string {
    return `
import os
from contextlib import asynccontextmanager

import asyncpg
from fastapi import FastAPI

pool = None

@asynccontextmanager
async def lifespan(app: FastAPI):
    global pool
    pool = await asyncpg.create_pool(
        host=os.environ["DB_HOST"], port=int(os.environ["DB_PORT"]),
        database=os.environ["DB_NAME"], user=os.environ["DB_USER"],
        password=os.environ["DB_PASSWORD"], min_size=1, max_size=5,
    )
    async with pool.acquire() as conn:
        await conn.execute("CREATE TABLE IF NOT EXISTS hits (id SERIAL PRIMARY KEY, at TIMESTAMPTZ DEFAULT NOW())")
    yield
    await pool.close()

app = FastAPI(title="AWS 3-Tier API", lifespan=lifespan)

@app.get("/health")
async def health():
    async with pool.acquire() as conn:
        await conn.fetchval("SELECT 1")
    return {"status": "healthy", "tier": "app", "database": "connected"}

@app.get("/")
async def root():
    async with pool.acquire() as conn:
        await conn.execute("INSERT INTO hits DEFAULT VALUES")
        hits = await conn.fetchval("SELECT COUNT(*) FROM hits")
    return {"message": "AWS 3-Tier Application API", "tiers": ["web", "app", "data"], "hits": hits}
`;
  }
}
