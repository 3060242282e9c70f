export { Component, type CommandSender } from './base.js';
export { DriveComponent, type SpinDirection } from './drive.js';
export { DomeComponent, DOME_LIMITS } from './dome.js';
export { StanceComponent } from './stance.js';
export { LedComponent, type Color, type LedState } from './leds.js';
export { AudioComponent } from './audio.js';
