export type ProbeResult = {
  reachable: boolean;
  statusCode: number | null;
  error: string | null;
};

export type MonitoredTarget = {
  url: string;
  key: string;
};
