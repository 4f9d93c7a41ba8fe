export interface StampOptions {
  /** 0 on the first attempt */
  retryCount: number;
  /** Epoch ms at which the logical call started */
  clientStartTime: number;
  includeRetryParameters: boolean;
  includeRequestGuid: boolean;
}
