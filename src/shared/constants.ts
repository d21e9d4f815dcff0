/** Protocol version exchanged in `init`. */
export const PROTOCOL_VERSION = 1;

/** Prefix of channel ids the bridge allocates for itself. Front ends may not open ids starting with it. */
export const RESERVED_CHANNEL_PREFIX = "!";

/** Upper bound on one frame's channel + payload size. */
export const DEFAULT_MAX_FRAME_SIZE = 64 * 1024 * 1024;

export const SUPERUSER_PATH = "/superuser";
export const SUPERUSER_INTERFACE = "cockpit.Superuser";
export const SUPERUSER_ERROR = "cockpit.Superuser.Error";

export const LOGIN_MESSAGES_PATH = "/LoginMessages";
export const LOGIN_MESSAGES_INTERFACE = "cockpit.LoginMessages";

export const PROPERTIES_INTERFACE = "org.freedesktop.DBus.Properties";

export const DBUS_ERROR = {
  FAILED: "org.freedesktop.DBus.Error.Failed",
  UNKNOWN_OBJECT: "org.freedesktop.DBus.Error.UnknownObject",
  UNKNOWN_INTERFACE: "org.freedesktop.DBus.Error.UnknownInterface",
  UNKNOWN_METHOD: "org.freedesktop.DBus.Error.UnknownMethod",
  UNKNOWN_PROPERTY: "org.freedesktop.DBus.Error.UnknownProperty",
  PROPERTY_READ_ONLY: "org.freedesktop.DBus.Error.PropertyReadOnly",
  INVALID_ARGS: "org.freedesktop.DBus.Error.InvalidArgs",
} as const;
