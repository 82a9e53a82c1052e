import * as cdk from 'aws-cdk-lib/core';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as elbv2 from 'aws-cdk-lib/aws-elasticloadbalancingv2';
import * as rds from 'aws-cdk-lib/aws-rds';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { Construct } from 'constructs';

import { AlarmNotifications } from '../../shared/lib/alarm-notifications';
import { ConfigurationError } from '../../shared/lib/errors';
import type { TierConfig } from '../../shared/lib/tier-config';
import { TierNetwork } from '../../shared/lib/tier-network';
import { WebFleet } from '../../shared/lib/web-fleet';

export interface Aws2TierAppStackProps extends cdk.StackProps {
  readonly config: TierConfig;
}

/**
 * AWS 2-Tier Application Stack
 *
 * Architecture:
 * ┌─────────────────────────────────────────────────────────────┐
 * │                        WEB TIER                             │
 * │  ALB (public subnet) → Auto Scaling group (public subnet)   │
 * └─────────────────────────────────────────────────────────────┘
 *                              │
 * ┌─────────────────────────────────────────────────────────────┐
 * │                        DATA TIER                            │
 * │  RDS MySQL (isolated subnet, web tier access only)          │
 * └─────────────────────────────────────────────────────────────┘
 */
export class Aws2TierAppStack extends cdk.Stack {
  public readonly network: TierNetwork;
  public readonly database: rds.DatabaseInstance;
  public readonly databaseSecret: secretsmanager.Secret;
  public readonly webFleet: WebFleet;
  public readonly alb: elbv2.ApplicationLoadBalancer;
  public readonly alarms: AlarmNotifications;

  constructor(scope: Construct, id: string, props: Aws2TierAppStackProps) {
    super(scope, id, props);

    const { config } = props;
    const isProduction = config.environment === 'production';

    if (config.maxAzs < 2) {
      throw new ConfigurationError('Invalid tier configuration', [
        'maxAzs: RDS subnet groups need subnets in at least 2 AZs',
      ]);
    }

    // ================================================================
    // VPC with 2-Tier Subnet Architecture
    // ================================================================
    this.network = new TierNetwork(this, 'Network', {
      config,
      tiers: [
        { name: 'Public', subnetType: ec2.SubnetType.PUBLIC },
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

    // Web Security Group (web tier)
    const webSg = new ec2.SecurityGroup(this, 'WebSecurityGroup', {
      vpc,
      description: 'Security group for web servers - accepts traffic from ALB only',
      allowAllOutbound: true,
    });
    webSg.addIngressRule(albSg, ec2.Port.tcp(80), 'Allow from ALB');
    if (config.adminCidr) {
      webSg.addIngressRule(ec2.Peer.ipv4(config.adminCidr), ec2.Port.tcp(22), 'Allow SSH from admin CIDR');
    }

    // Database Security Group (data tier)
    const dbSg = new ec2.SecurityGroup(this, 'DatabaseSecurityGroup', {
      vpc,
      description: 'Security group for RDS - accepts traffic from web servers only',
      allowAllOutbound: false,
    });
    dbSg.addIngressRule(webSg, ec2.Port.tcp(3306), 'Allow MySQL from web servers');

    // ================================================================
    // RDS MySQL (Data Tier)
    // ================================================================
    this.databaseSecret = new secretsmanager.Secret(this, 'DbSecret', {
      secretName: `${this.stackName}/database/credentials`,
      description: 'MySQL database credentials',
      generateSecretString: {
        secretStringTemplate: JSON.stringify({ username: 'appuser' }),
        generateStringKey: 'password',
        excludePunctuation: true,
        passwordLength: 32,
      },
    });

    this.database = new rds.DatabaseInstance(this, 'Database', {
      engine: rds.DatabaseInstanceEngine.mysql({
        version: rds.MysqlEngineVersion.VER_8_0,
      }),
      instanceType: new ec2.InstanceType(config.dbInstanceType),
      vpc,
      vpcSubnets: this.network.subnetsFor('Database'),
      securityGroups: [dbSg],
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
    });

    // ================================================================
    // Web Tier (Auto Scaling group)
    // ================================================================
    // Public subnets without NAT: instances need a public IP to reach
    // package repositories; inbound is still ALB-only via webSg.
    this.webFleet = new WebFleet(this, 'WebFleet', {
      vpc,
      vpcSubnets: this.network.subnetsFor('Public'),
      securityGroup: webSg,
      instanceType: config.instanceType,
      userData: this.createUserData(
        this.databaseSecret.secretArn,
        this.database.instanceEndpoint.hostname
      ),
      minCapacity: config.minCapacity,
      desiredCapacity: config.desiredCapacity,
      maxCapacity: config.maxCapacity,
      associatePublicIpAddress: true,
      roleDescription: 'Role for web tier with SSM, CloudWatch, and Secrets Manager access',
    });
    this.webFleet.node.addDependency(this.database);

    this.databaseSecret.grantRead(this.webFleet.role);

    // ================================================================
    // Application Load Balancer
    // ================================================================
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
    // Alarms
    // ================================================================
    this.alarms = new AlarmNotifications(this, 'Alarms', {
      displayName: `${config.projectName} 2-tier alarms`,
      alertEmail: config.alertEmail,
    });

    this.alarms.watch(
      new cloudwatch.Alarm(this, 'UnhealthyHostsAlarm', {
        alarmDescription: 'Web targets failing the ALB health check',
        metric: webTargets.metrics.unhealthyHostCount({
          period: cdk.Duration.minutes(1),
          statistic: 'Maximum',
        }),
        threshold: 1,
        evaluationPeriods: 3,
        comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_OR_EQUAL_TO_THRESHOLD,
        treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
      })
    );

    this.alarms.watch(
      new cloudwatch.Alarm(this, 'DatabaseCpuAlarm', {
        alarmDescription: 'RDS MySQL CPU above 80%',
        metric: this.database.metricCPUUtilization({ period: cdk.Duration.minutes(5) }),
        threshold: 80,
        evaluationPeriods: 3,
        comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      })
    );

    // ================================================================
    // Outputs
    // ================================================================
    new cdk.CfnOutput(this, 'LoadBalancerUrl', {
      value: `http://${this.alb.loadBalancerDnsName}`,
      description: 'Application URL (ALB)',
    });

    new cdk.CfnOutput(this, 'DatabaseEndpoint', {
      value: this.database.instanceEndpoint.hostname,
      description: 'RDS MySQL endpoint',
    });

    new cdk.CfnOutput(this, 'DatabaseSecretArn', {
      value: this.databaseSecret.secretArn,
      description: 'Database credentials secret ARN',
    });

    new cdk.CfnOutput(this, 'AutoScalingGroupName', {
      value: this.webFleet.autoScalingGroup.autoScalingGroupName,
      description: 'Web tier Auto Scaling group',
    });

    new cdk.CfnOutput(this, 'AlarmTopicArn', {
      value: this.alarms.topic.topicArn,
      description: 'SNS topic notified by the stack alarms',
    });
  }

  /**
   * Web server user data: nginx + PHP reading DB credentials from Secrets Manager
   */
  private createUserData(secretArn: string, dbHost: string): ec2.UserData {
    const userData = ec2.UserData.forLinux();
    userData.addCommands(
      'set -euo pipefail',
      'exec > >(tee /var/log/user-data.log) 2>&1',
      '',
      'dnf install -y nginx php-fpm php-mysqlnd jq',
      '',
      '# Database connection settings for the application',
      `SECRET_ARN="${secretArn}"`,
      'TOKEN=$(curl -s -X PUT http://169.254.169.254/latest/api/token -H "X-aws-ec2-metadata-token-ttl-seconds: 300")',
      'REGION=$(curl -s -H "X-aws-ec2-metadata-token: $TOKEN" http://169.254.169.254/latest/meta-data/placement/region)',
      'SECRET_JSON=$(aws secretsmanager get-secret-value --secret-id "$SECRET_ARN" --region "$REGION" --query SecretString --output text)',
      'install -d -m 750 -o root -g nginx /etc/app',
      'cat > /etc/app/database.env << EOF',
      `DB_HOST=${dbHost}`,
      'DB_PORT=3306',
      'DB_NAME=appdb',
      'DB_USER=$(echo "$SECRET_JSON" | jq -r .username)',
      'DB_PASSWORD=$(echo "$SECRET_JSON" | jq -r .password)',
      'EOF',
      'chmod 640 /etc/app/database.env',
      'chgrp nginx /etc/app/database.env',
      '',
      'cat > /usr/share/nginx/html/index.php << \'PHPEOF\'',
      '<?php',
      '$env = parse_ini_file("/etc/app/database.env");',
      '$db = @new mysqli($env["DB_HOST"], $env["DB_USER"], $env["DB_PASSWORD"], $env["DB_NAME"], (int) $env["DB_PORT"]);',
      'header("Content-Type: application/json");',
      'echo json_encode([',
      '  "message" => "AWS 2-Tier Application",',
      '  "tiers" => ["ALB + EC2", "RDS MySQL"],',
      '  "database" => $db->connect_errno ? "unavailable" : "connected",',
      ']);',
      'PHPEOF',
      '',
      'cat > /etc/nginx/default.d/health.conf << \'NGINXEOF\'',
      'location = /health {',
      '    default_type application/json;',
      '    return 200 \'{"status":"healthy"}\';',
      '}',
      'NGINXEOF',
      '',
      'systemctl enable --now php-fpm nginx',
    );
    return userData;
  }
}
