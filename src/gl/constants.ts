/**
 * WebGL2 enum values.
 *
 * Kept as plain numbers so nothing references WebGL2RenderingContext at module
 * load time (the library loads and is tested without a browser).
 */

// Buffers
export const GL_ARRAY_BUFFER = 0x8892;
export const GL_ELEMENT_ARRAY_BUFFER = 0x8893;
export const GL_UNIFORM_BUFFER = 0x8a11;
export const GL_STATIC_DRAW = 0x88e4;
export const GL_DYNAMIC_DRAW = 0x88e8;
export const GL_STREAM_DRAW = 0x88e0;

// Data types
export const GL_BYTE = 0x1400;
export const GL_UNSIGNED_BYTE = 0x1401;
export const GL_SHORT = 0x1402;
export const GL_UNSIGNED_SHORT = 0x1403;
export const GL_INT = 0x1404;
export const GL_UNSIGNED_INT = 0x1405;
export const GL_FLOAT = 0x1406;
export const GL_HALF_FLOAT = 0x140b;
export const GL_UNSIGNED_INT_24_8 = 0x84fa;

// Uniform types
export const GL_FLOAT_VEC2 = 0x8b50;
export const GL_FLOAT_VEC3 = 0x8b51;
export const GL_FLOAT_VEC4 = 0x8b52;
export const GL_INT_VEC2 = 0x8b53;
export const GL_INT_VEC3 = 0x8b54;
export const GL_INT_VEC4 = 0x8b55;
export const GL_BOOL = 0x8b56;
export const GL_BOOL_VEC2 = 0x8b57;
export const GL_BOOL_VEC3 = 0x8b58;
export const GL_BOOL_VEC4 = 0x8b59;
export const GL_FLOAT_MAT2 = 0x8b5a;
export const GL_FLOAT_MAT3 = 0x8b5b;
export const GL_FLOAT_MAT4 = 0x8b5c;
export const GL_SAMPLER_2D = 0x8b5e;
export const GL_SAMPLER_3D = 0x8b5f;
export const GL_SAMPLER_CUBE = 0x8b60;
export const GL_SAMPLER_2D_SHADOW = 0x8b62;
export const GL_SAMPLER_2D_ARRAY = 0x8dc1;
export const GL_INT_SAMPLER_2D = 0x8dca;
export const GL_UNSIGNED_INT_SAMPLER_2D = 0x8dd2;
export const GL_UNSIGNED_INT_VEC2 = 0x8dc6;
export const GL_UNSIGNED_INT_VEC3 = 0x8dc7;
export const GL_UNSIGNED_INT_VEC4 = 0x8dc8;

// Shaders
export const GL_FRAGMENT_SHADER = 0x8b30;
export const GL_VERTEX_SHADER = 0x8b31;
export const GL_COMPILE_STATUS = 0x8b81;
export const GL_LINK_STATUS = 0x8b82;
export const GL_ACTIVE_UNIFORMS = 0x8b86;
export const GL_ACTIVE_ATTRIBUTES = 0x8b89;

// Limits
export const GL_MAX_VERTEX_ATTRIBS = 0x8869;
export const GL_MAX_COMBINED_TEXTURE_IMAGE_UNITS = 0x8b4d;

// Textures
export const GL_TEXTURE_2D = 0x0de1;
export const GL_TEXTURE0 = 0x84c0;
export const GL_TEXTURE_MAG_FILTER = 0x2800;
export const GL_TEXTURE_MIN_FILTER = 0x2801;
export const GL_TEXTURE_WRAP_S = 0x2802;
export const GL_TEXTURE_WRAP_T = 0x2803;
export const GL_NEAREST = 0x2600;
export const GL_LINEAR = 0x2601;
export const GL_NEAREST_MIPMAP_NEAREST = 0x2700;
export const GL_LINEAR_MIPMAP_NEAREST = 0x2701;
export const GL_NEAREST_MIPMAP_LINEAR = 0x2702;
export const GL_LINEAR_MIPMAP_LINEAR = 0x2703;
export const GL_REPEAT = 0x2901;
export const GL_CLAMP_TO_EDGE = 0x812f;
export const GL_MIRRORED_REPEAT = 0x8370;

// Pixel formats
export const GL_RED = 0x1903;
export const GL_RGB = 0x1907;
export const GL_RGBA = 0x1908;
export const GL_R8 = 0x8229;
export const GL_RGB8 = 0x8051;
export const GL_RGBA8 = 0x8058;
export const GL_SRGB8_ALPHA8 = 0x8c43;
export const GL_RGBA16F = 0x881a;
export const GL_RGBA32F = 0x8814;
export const GL_DEPTH_COMPONENT = 0x1902;
export const GL_DEPTH_STENCIL = 0x84f9;
export const GL_DEPTH_COMPONENT16 = 0x81a5;
export const GL_DEPTH_COMPONENT24 = 0x81a6;
export const GL_DEPTH24_STENCIL8 = 0x88f0;

// Framebuffers
export const GL_FRAMEBUFFER = 0x8d40;
export const GL_RENDERBUFFER = 0x8d41;
export const GL_COLOR_ATTACHMENT0 = 0x8ce0;
export const GL_DEPTH_ATTACHMENT = 0x8d00;
export const GL_DEPTH_STENCIL_ATTACHMENT = 0x821a;
export const GL_FRAMEBUFFER_COMPLETE = 0x8cd5;

// Capabilities
export const GL_BLEND = 0x0be2;
export const GL_DEPTH_TEST = 0x0b71;
export const GL_STENCIL_TEST = 0x0b90;
export const GL_SCISSOR_TEST = 0x0c11;
export const GL_CULL_FACE = 0x0b44;
export const GL_POLYGON_OFFSET_FILL = 0x8037;

// Blend factors and equations
export const GL_ZERO = 0;
export const GL_ONE = 1;
export const GL_SRC_COLOR = 0x0300;
export const GL_ONE_MINUS_SRC_COLOR = 0x0301;
export const GL_SRC_ALPHA = 0x0302;
export const GL_ONE_MINUS_SRC_ALPHA = 0x0303;
export const GL_DST_ALPHA = 0x0304;
export const GL_ONE_MINUS_DST_ALPHA = 0x0305;
export const GL_DST_COLOR = 0x0306;
export const GL_ONE_MINUS_DST_COLOR = 0x0307;
export const GL_SRC_ALPHA_SATURATE = 0x0308;
export const GL_CONSTANT_COLOR = 0x8001;
export const GL_ONE_MINUS_CONSTANT_COLOR = 0x8002;
export const GL_CONSTANT_ALPHA = 0x8003;
export const GL_ONE_MINUS_CONSTANT_ALPHA = 0x8004;
export const GL_FUNC_ADD = 0x8006;
export const GL_MIN = 0x8007;
export const GL_MAX = 0x8008;
export const GL_FUNC_SUBTRACT = 0x800a;
export const GL_FUNC_REVERSE_SUBTRACT = 0x800b;

// Comparison functions (depth and stencil)
export const GL_NEVER = 0x0200;
export const GL_LESS = 0x0201;
export const GL_EQUAL = 0x0202;
export const GL_LEQUAL = 0x0203;
export const GL_GREATER = 0x0204;
export const GL_NOTEQUAL = 0x0205;
export const GL_GEQUAL = 0x0206;
export const GL_ALWAYS = 0x0207;

// Stencil operations
export const GL_KEEP = 0x1e00;
export const GL_REPLACE = 0x1e01;
export const GL_INCR = 0x1e02;
export const GL_DECR = 0x1e03;
export const GL_INVERT = 0x150a;
export const GL_INCR_WRAP = 0x8507;
export const GL_DECR_WRAP = 0x8508;

// Culling
export const GL_FRONT = 0x0404;
export const GL_BACK = 0x0405;
export const GL_FRONT_AND_BACK = 0x0408;
export const GL_CW = 0x0900;
export const GL_CCW = 0x0901;

// Draw modes
export const GL_POINTS = 0x0000;
export const GL_LINES = 0x0001;
export const GL_LINE_LOOP = 0x0002;
export const GL_LINE_STRIP = 0x0003;
export const GL_TRIANGLES = 0x0004;
export const GL_TRIANGLE_STRIP = 0x0005;
export const GL_TRIANGLE_FAN = 0x0006;

// Clear bits
export const GL_DEPTH_BUFFER_BIT = 0x00000100;
export const GL_STENCIL_BUFFER_BIT = 0x00000400;
export const GL_COLOR_BUFFER_BIT = 0x00004000;
