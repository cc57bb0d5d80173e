export * from '@/types';
export * from '@/errors';

export * from '@/constants/calibration';
export * from '@/constants/capture';
export * from '@/constants/channels';
export * from '@/constants/control';

export * from '@/utils/channelMath';
export * from '@/utils/plateGeometry';
export * from '@/utils/time';
export * from '@/utils/wellIds';

export * from '@/services/calibration';
export * from '@/services/captureOrchestrator';
export * from '@/services/capturePayloadStorage';
export * from '@/services/captureSettingsStorage';
export * from '@/services/logStore';
export * from '@/services/motion/lineDecoder';
export * from '@/services/motion/motionSession';
export * from '@/services/motion/positionParser';
export * from '@/services/motion/serialTransport';
export * from '@/services/motion/simulatedStageController';
export * from '@/services/sensor/spectralSensor';
export * from '@/services/wellConfigStorage';
