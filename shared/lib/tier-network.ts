import * as cdk from 'aws-cdk-lib/core';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as logs from 'aws-cdk-lib/aws-logs';
import { Construct } from 'constructs';

import { ConfigurationError } from './errors';
import type { TierConfig } from './tier-config';
import { subnetCapacity } from './validation';

export interface SubnetTier {
  /** Subnet group name, e.g. 'Public', 'App', 'Database' */
  readonly name: string;
  readonly subnetType: ec2.SubnetType;
}

export type NetworkConfig = Pick<
  TierConfig,
  'vpcCidr' | 'maxAzs' | 'subnetCidrMask' | 'natGateways' | 'environment'
>;

export interface TierNetworkProps {
  readonly config: NetworkConfig;
  /** One subnet per tier is created in each AZ */
  readonly tiers: readonly SubnetTier[];
}

/**
 * VPC laid out as one subnet group per architecture tier
 *
 * - NAT gateways only when a tier needs egress
 * - Flow log of rejected traffic to CloudWatch Logs
 * - S3 gateway endpoint for private tiers (package mirrors, no NAT charge)
 */
export class TierNetwork extends Construct {
  public readonly vpc: ec2.Vpc;
  public readonly flowLogGroup: logs.LogGroup;
  private readonly tierNames: ReadonlySet<string>;

  constructor(scope: Construct, id: string, props: TierNetworkProps) {
    super(scope, id);

    const { config, tiers } = props;
    TierNetwork.validate(config, tiers);
    this.tierNames = new Set(tiers.map((tier) => tier.name));

    const needsEgress = tiers.some((tier) => tier.subnetType === ec2.SubnetType.PRIVATE_WITH_EGRESS);
    const hasPrivate = tiers.some((tier) => tier.subnetType !== ec2.SubnetType.PUBLIC);

    this.vpc = new ec2.Vpc(this, 'Vpc', {
      ipAddresses: ec2.IpAddresses.cidr(config.vpcCidr),
      maxAzs: config.maxAzs,
      natGateways: needsEgress ? config.natGateways : 0,
      subnetConfiguration: tiers.map((tier) => ({
        name: tier.name,
        subnetType: tier.subnetType,
        cidrMask: config.subnetCidrMask,
      })),
      enableDnsHostnames: true,
      enableDnsSupport: true,
    });

    this.flowLogGroup = new logs.LogGroup(this, 'FlowLogGroup', {
      retention:
        config.environment === 'production' ? logs.RetentionDays.THREE_MONTHS : logs.RetentionDays.ONE_WEEK,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
    });

    this.vpc.addFlowLog('FlowLog', {
      destination: ec2.FlowLogDestination.toCloudWatchLogs(this.flowLogGroup),
      trafficType: ec2.FlowLogTrafficType.REJECT,
    });

    if (hasPrivate) {
      this.vpc.addGatewayEndpoint('S3Endpoint', {
        service: ec2.GatewayVpcEndpointAwsService.S3,
      });
    }
  }

  /**
   * Subnet selection for a tier created by this network
   */
  public subnetsFor(tierName: string): ec2.SubnetSelection {
    if (!this.tierNames.has(tierName)) {
      throw new ConfigurationError(`Unknown subnet tier '${tierName}'`, [
        `available tiers: ${[...this.tierNames].join(', ')}`,
      ]);
    }
    return { subnetGroupName: tierName };
  }

  private static validate(config: NetworkConfig, tiers: readonly SubnetTier[]): void {
    const issues: string[] = [];

    if (tiers.length === 0) {
      issues.push('tiers: at least one subnet tier is required');
    }

    const names = tiers.map((tier) => tier.name);
    const duplicates = names.filter((name, index) => names.indexOf(name) !== index);
    if (duplicates.length > 0) {
      issues.push(`tiers: duplicate subnet tier names ${duplicates.join(', ')}`);
    }

    const required = tiers.length * config.maxAzs;
    const available = subnetCapacity(config.vpcCidr, config.subnetCidrMask);
    if (required > available) {
      issues.push(
        `vpcCidr: ${required} /${config.subnetCidrMask} subnets needed but ${config.vpcCidr} holds ${available}`,
      );
    }

    const needsEgress = tiers.some((tier) => tier.subnetType === ec2.SubnetType.PRIVATE_WITH_EGRESS);
    if (needsEgress) {
      if (!tiers.some((tier) => tier.subnetType === ec2.SubnetType.PUBLIC)) {
        issues.push('tiers: private subnets with egress need a public tier for the NAT gateway');
      }
      if (config.natGateways < 1) {
        issues.push('natGateways: must be at least 1 when private subnets need egress');
      }
    }

    if (issues.length > 0) {
      throw new ConfigurationError('Invalid network layout', issues);
    }
  }
}
