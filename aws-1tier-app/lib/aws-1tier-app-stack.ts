import * as cdk from 'aws-cdk-lib/core';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as cloudwatchActions from 'aws-cdk-lib/aws-cloudwatch-actions';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import { Construct } from 'constructs';

import { AlarmNotifications } from '../../shared/lib/alarm-notifications';
import { createInstanceRole, encryptedRootVolume, machineImageFor } from '../../shared/lib/compute';
import type { TierConfig } from '../../shared/lib/tier-config';
import { TierNetwork } from '../../shared/lib/tier-network';

export interface Aws1TierAppStackProps extends cdk.StackProps {
  readonly config: TierConfig;
}

/**
 * AWS 1-Tier Application Stack
 *
 * Architecture:
 * ┌─────────────────────────────────────────────────────────────┐
 * │  Internet → Elastic IP → EC2 (public subnet)                │
 * │             nginx (web) + application + MariaDB (data)      │
 * └─────────────────────────────────────────────────────────────┘
 *
 * Every tier runs on a single host. Suitable for development,
 * demos and low-traffic sites; there is no redundancy.
 */
export class Aws1TierAppStack extends cdk.Stack {
  public readonly network: TierNetwork;
  public readonly securityGroup: ec2.SecurityGroup;
  public readonly instance: ec2.Instance;
  public readonly elasticIp: ec2.CfnEIP;
  public readonly recoveryAlarm: cloudwatch.Alarm;
  public readonly alarms: AlarmNotifications;

  constructor(scope: Construct, id: string, props: Aws1TierAppStackProps) {
    super(scope, id, props);

    const { config } = props;

    // ============================================================
    // VPC - public subnets only, no NAT
    // ============================================================
    this.network = new TierNetwork(this, 'Network', {
      config,
      tiers: [{ name: 'Public', subnetType: ec2.SubnetType.PUBLIC }],
    });

    // ============================================================
    // Security Group
    // ============================================================
    this.securityGroup = new ec2.SecurityGroup(this, 'WebSecurityGroup', {
      vpc: this.network.vpc,
      description: 'Security group for single-tier web server - accepts HTTP/HTTPS from internet',
      allowAllOutbound: true,
    });
    this.securityGroup.addIngressRule(ec2.Peer.anyIpv4(), ec2.Port.tcp(80), 'Allow HTTP');
    this.securityGroup.addIngressRule(ec2.Peer.anyIpv4(), ec2.Port.tcp(443), 'Allow HTTPS');

    // SSH only from the admin network; Session Manager works without it
    if (config.adminCidr) {
      this.securityGroup.addIngressRule(
        ec2.Peer.ipv4(config.adminCidr),
        ec2.Port.tcp(22),
        'Allow SSH from admin CIDR'
      );
    }

    // ============================================================
    // EC2 Instance
    // ============================================================
    const instanceType = new ec2.InstanceType(config.instanceType);

    this.instance = new ec2.Instance(this, 'WebServer', {
      vpc: this.network.vpc,
      vpcSubnets: this.network.subnetsFor('Public'),
      securityGroup: this.securityGroup,
      role: createInstanceRole(this, 'InstanceRole', 'Role for single-tier web server with SSM access'),
      instanceType,
      machineImage: machineImageFor(instanceType),
      // Root volume also holds the MariaDB data directory
      blockDevices: [encryptedRootVolume(config.dbAllocatedStorage)],
      requireImdsv2: true,
      userData: this.createUserData(config.projectName),
      detailedMonitoring: config.environment === 'production',
    });

    // Stable public address across stop/start
    this.elasticIp = new ec2.CfnEIP(this, 'ElasticIp', {
      domain: 'vpc',
      instanceId: this.instance.instanceId,
    });

    // ============================================================
    // CloudWatch Alarm - recover on host failure
    // ============================================================
    this.recoveryAlarm = new cloudwatch.Alarm(this, 'SystemStatusAlarm', {
      alarmDescription: 'Recover the web server when the underlying host fails its system status check',
      metric: new cloudwatch.Metric({
        namespace: 'AWS/EC2',
        metricName: 'StatusCheckFailed_System',
        dimensionsMap: {
          InstanceId: this.instance.instanceId,
        },
        statistic: 'Maximum',
        period: cdk.Duration.minutes(1),
      }),
      threshold: 1,
      evaluationPeriods: 2,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_OR_EQUAL_TO_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });
    this.recoveryAlarm.addAlarmAction(
      new cloudwatchActions.Ec2Action(cloudwatchActions.Ec2InstanceAction.RECOVER)
    );

    this.alarms = new AlarmNotifications(this, 'Alarms', {
      displayName: `${config.projectName} web server alarms`,
      alertEmail: config.alertEmail,
    });
    this.alarms.watch(this.recoveryAlarm);

    // ============================================================
    // Outputs
    // ============================================================
    new cdk.CfnOutput(this, 'InstanceId', {
      value: this.instance.instanceId,
      description: 'EC2 Instance ID',
    });

    new cdk.CfnOutput(this, 'PublicIp', {
      value: this.elasticIp.ref,
      description: 'Elastic IP of the web server',
    });

    new cdk.CfnOutput(this, 'WebUrl', {
      value: `http://${this.elasticIp.ref}`,
      description: 'Web server URL',
    });

    new cdk.CfnOutput(this, 'SsmSessionCommand', {
      value: `aws ssm start-session --target ${this.instance.instanceId} --region ${this.region}`,
      description: 'SSM Session Manager command',
    });

    new cdk.CfnOutput(this, 'AlarmTopicArn', {
      value: this.alarms.topic.topicArn,
      description: 'SNS topic notified by the recovery alarm',
    });
  }

  /**
   * Install nginx and a local MariaDB on Amazon Linux 2023
   */
  private createUserData(projectName: string): ec2.UserData {
    const userData = ec2.UserData.forLinux();
    userData.addCommands(
      'set -euo pipefail',
      'exec > >(tee /var/log/user-data.log) 2>&1',
      '',
      'dnf install -y nginx mariadb105-server',
      'systemctl enable --now mariadb',
      '',
      '# Local application database',
      'mysql -e "CREATE DATABASE IF NOT EXISTS appdb"',
      '',
      'cat > /usr/share/nginx/html/index.html << \'HTMLEOF\'',
      '<!DOCTYPE html>',
      `<html lang="en"><head><meta charset="UTF-8"><title>${projectName}</title></head>`,
      `<body><h1>${projectName}</h1><p>1-Tier: nginx + MariaDB on one EC2 instance</p></body></html>`,
      'HTMLEOF',
      '',
      'cat > /etc/nginx/default.d/health.conf << \'NGINXEOF\'',
      'location = /health {',
      '    default_type application/json;',
      '    return 200 \'{"status":"healthy"}\';',
      '}',
      'NGINXEOF',
      '',
      'systemctl enable --now nginx',
    );
    return userData;
  }
}
