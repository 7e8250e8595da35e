import type { CameraDescriptor } from "@camrelay/shared";
import {
  parseMotionNotifications,
  readSubscriptionTimes,
  type MotionNotification,
  type SubscriptionTimes
} from "./messages.js";
import {
  NS,
  child,
  createUsernameToken,
  escapeXml,
  soapCall,
  text,
  type UsernameToken,
  type XmlNode
} from "./soap.js";

const ACTIONS = {
  getSystemDateAndTime: `${NS.tds}/GetSystemDateAndTime`,
  getDeviceInformation: `${NS.tds}/GetDeviceInformation`,
  getCapabilities: `${NS.tds}/GetCapabilities`,
  createPullPointSubscription: `${NS.tev}/EventPortType/CreatePullPointSubscriptionRequest`,
  pullMessages: `${NS.tev}/PullPointSubscription/PullMessagesRequest`,
  setSynchronizationPoint: `${NS.tev}/PullPointSubscription/SetSynchronizationPointRequest`,
  renew: "http://docs.oasis-open.org/wsn/bw-2/SubscriptionManager/RenewRequest",
  unsubscribe: "http://docs.oasis-open.org/wsn/bw-2/SubscriptionManager/UnsubscribeRequest"
} as const;

export interface DeviceInformation {
  manufacturer?: string;
  model?: string;
  firmwareVersion?: string;
}

export interface PullResult extends SubscriptionTimes {
  notifications: MotionNotification[];
}

/**
 * One pull-point subscription against one camera. Instances are single use:
 * the event source creates a fresh client for every (re)subscription.
 */
export interface PullPointClient {
  prepare(signal?: AbortSignal): Promise<DeviceInformation>;
  createSubscription(topic: string, initialTermination: string, signal?: AbortSignal): Promise<SubscriptionTimes>;
  setSynchronizationPoint(signal?: AbortSignal): Promise<void>;
  pullMessages(timeoutSec: number, messageLimit: number, signal?: AbortSignal): Promise<PullResult>;
  renew(termination: string, signal?: AbortSignal): Promise<SubscriptionTimes>;
  unsubscribe(): Promise<void>;
}

export type PullPointClientFactory = (camera: CameraDescriptor) => PullPointClient;

/** xs:duration in whole seconds, e.g. "PT600S". */
export function relativeDuration(seconds: number): string {
  return `PT${Math.max(1, Math.floor(seconds))}S`;
}

export function deviceServiceUrl(camera: Pick<CameraDescriptor, "host" | "onvifPort">): string {
  const host = camera.host.includes(":") && !camera.host.startsWith("[") ? `[${camera.host}]` : camera.host;
  return `http://${host}:${camera.onvifPort}/onvif/device_service`;
}

export class OnvifPullPointClient implements PullPointClient {
  private readonly deviceUrl: string;
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private clockOffsetMs = 0;
  private eventsUrl?: string;
  private subscriptionUrl?: string;

  constructor(
    private readonly camera: CameraDescriptor,
    options: { timeoutMs: number; now?: () => number }
  ) {
    this.deviceUrl = deviceServiceUrl(camera);
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? (() => Date.now());
  }

  async prepare(signal?: AbortSignal): Promise<DeviceInformation> {
    await this.syncClock(signal);

    const info = await soapCall({
      url: this.deviceUrl,
      action: ACTIONS.getDeviceInformation,
      body: `<tds:GetDeviceInformation xmlns:tds="${NS.tds}"/>`,
      token: this.token(),
      timeoutMs: this.timeoutMs,
      signal
    });
    const response = child(info, "GetDeviceInformationResponse");

    const capabilities = await soapCall({
      url: this.deviceUrl,
      action: ACTIONS.getCapabilities,
      body: `<tds:GetCapabilities xmlns:tds="${NS.tds}"><tds:Category>Events</tds:Category></tds:GetCapabilities>`,
      token: this.token(),
      timeoutMs: this.timeoutMs,
      signal
    });
    const xaddr = text(child(capabilities, "GetCapabilitiesResponse", "Capabilities", "Events", "XAddr"));
    this.eventsUrl = xaddr && xaddr.length > 0 ? xaddr : new URL("/onvif/Events", this.deviceUrl).toString();

    return {
      manufacturer: text(child(response, "Manufacturer")),
      model: text(child(response, "Model")),
      firmwareVersion: text(child(response, "FirmwareVersion"))
    };
  }

  async createSubscription(topic: string, initialTermination: string, signal?: AbortSignal): Promise<SubscriptionTimes> {
    const body = await soapCall({
      url: this.eventsUrl ?? new URL("/onvif/Events", this.deviceUrl).toString(),
      action: ACTIONS.createPullPointSubscription,
      body: `<tev:CreatePullPointSubscription xmlns:tev="${NS.tev}" xmlns:wsnt="${NS.wsnt}">
      <tev:Filter>
        <wsnt:TopicExpression Dialect="http://www.onvif.org/ver10/tev/topicExpression/ConcreteSet" xmlns:tns1="${NS.tns1}">${escapeXml(topic)}</wsnt:TopicExpression>
      </tev:Filter>
      <tev:InitialTerminationTime>${escapeXml(initialTermination)}</tev:InitialTerminationTime>
    </tev:CreatePullPointSubscription>`,
      token: this.token(),
      timeoutMs: this.timeoutMs,
      signal
    });

    const response = child(body, "CreatePullPointSubscriptionResponse");
    const address = text(child(response, "SubscriptionReference", "Address"));
    if (!address) {
      throw new Error("subscription response has no address");
    }
    this.subscriptionUrl = address;
    return readSubscriptionTimes(response);
  }

  async setSynchronizationPoint(signal?: AbortSignal): Promise<void> {
    await this.subscriptionCall(
      ACTIONS.setSynchronizationPoint,
      `<tev:SetSynchronizationPoint xmlns:tev="${NS.tev}"/>`,
      this.timeoutMs,
      signal
    );
  }

  async pullMessages(timeoutSec: number, messageLimit: number, signal?: AbortSignal): Promise<PullResult> {
    const body = await this.subscriptionCall(
      ACTIONS.pullMessages,
      `<tev:PullMessages xmlns:tev="${NS.tev}">
      <tev:Timeout>${relativeDuration(timeoutSec)}</tev:Timeout>
      <tev:MessageLimit>${Math.max(1, Math.floor(messageLimit))}</tev:MessageLimit>
    </tev:PullMessages>`,
      // the camera holds the request open for up to timeoutSec
      timeoutSec * 1000 + this.timeoutMs,
      signal
    );
    const response = child(body, "PullMessagesResponse");
    return {
      ...readSubscriptionTimes(response),
      notifications: parseMotionNotifications(response)
    };
  }

  async renew(termination: string, signal?: AbortSignal): Promise<SubscriptionTimes> {
    const body = await this.subscriptionCall(
      ACTIONS.renew,
      `<wsnt:Renew xmlns:wsnt="${NS.wsnt}"><wsnt:TerminationTime>${escapeXml(termination)}</wsnt:TerminationTime></wsnt:Renew>`,
      this.timeoutMs,
      signal
    );
    return readSubscriptionTimes(child(body, "RenewResponse"));
  }

  async unsubscribe(): Promise<void> {
    if (!this.subscriptionUrl) {
      return;
    }
    await this.subscriptionCall(ACTIONS.unsubscribe, `<wsnt:Unsubscribe xmlns:wsnt="${NS.wsnt}"/>`, this.timeoutMs);
    this.subscriptionUrl = undefined;
  }

  /** Camera UTC minus local time, so UsernameToken timestamps land inside the camera's window. */
  private async syncClock(signal?: AbortSignal): Promise<void> {
    const sentAt = this.now();
    const body = await soapCall({
      url: this.deviceUrl,
      action: ACTIONS.getSystemDateAndTime,
      body: `<tds:GetSystemDateAndTime xmlns:tds="${NS.tds}"/>`,
      timeoutMs: this.timeoutMs,
      signal
    });
    const utc = child(body, "GetSystemDateAndTimeResponse", "SystemDateAndTime", "UTCDateTime");
    const cameraMs = Date.UTC(
      Number(text(child(utc, "Date", "Year"))),
      Number(text(child(utc, "Date", "Month"))) - 1,
      Number(text(child(utc, "Date", "Day"))),
      Number(text(child(utc, "Time", "Hour"))),
      Number(text(child(utc, "Time", "Minute"))),
      Number(text(child(utc, "Time", "Second")))
    );
    this.clockOffsetMs = Number.isFinite(cameraMs) ? cameraMs - Math.round((sentAt + this.now()) / 2) : 0;
  }

  private token(): UsernameToken | undefined {
    if (!this.camera.username) {
      return undefined;
    }
    return createUsernameToken(
      { username: this.camera.username, password: this.camera.password },
      this.now() + this.clockOffsetMs
    );
  }

  private async subscriptionCall(action: string, body: string, timeoutMs: number, signal?: AbortSignal): Promise<XmlNode> {
    if (!this.subscriptionUrl) {
      throw new Error("no active subscription");
    }
    return await soapCall({
      url: this.subscriptionUrl,
      action,
      body,
      token: this.token(),
      addressing: true,
      timeoutMs,
      signal
    });
  }
}
