export * from './hand_types';
export * from './schemas';

export * from './kernel/config';
export * from './kernel/event_bus';
export * from './kernel/plugin_supervisor';

export * from './tracking/geometry';
export * from './tracking/finger_state';
export * from './tracking/smoothing_buffer';
export * from './tracking/stability_detector';
export * from './tracking/hand_tracking_session';
export * from './tracking/multi_hand_tracker';
export * from './tracking/detector_adapter';

export * from './calibration/calibration_types';
export * from './calibration/threshold_derivation';
export * from './calibration/calibration_session';

export * from './plugins/tracking_plugin';
export * from './plugins/calibration_plugin';
