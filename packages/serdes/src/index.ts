export type { AtomicCodec, CustomAtomicOptions, EnumLike } from "./atomic";
export {
	boolCodec,
	customCodec,
	enumCodec,
	floatCodec,
	formatFloat,
	intCodec,
	scalarCodec,
	strCodec,
} from "./atomic";
export { decodeValue, deserialize, encodeValue, serialize } from "./convert";
export type { DeserializeOptions } from "./descriptor";
export { DescriptorTable, serdesDescriptor } from "./descriptor";
export type { ElementDescriptor, FieldGetter, SchemaEntry } from "./element-descriptor";
export {
	DefaultValue,
	defaultsTo,
	fieldNameFromTag,
	parseElementDescriptor,
} from "./element-descriptor";
export type { SerDesErrorCode } from "./errors";
export {
	ConfigurationError,
	ConversionError,
	EncodeError,
	formatPath,
	MissingAttributeError,
	MissingElementError,
	MissingFieldError,
	ParseError,
	SerDesError,
	ShapeError,
	TagListComparison,
	UnexpectedElementError,
} from "./errors";
export { XmlFields } from "./fields";
export type { DefineRecordOptions, RecordObject, RecordType } from "./serializable";
export { defineRecord, XmlSerializable } from "./serializable";
export type {
	EnumSpec,
	RecordsSpec,
	TerseList,
	TerseRecordField,
	TerseType,
	VectorSpec,
} from "./terse";
export { fromTerse, LazyTarget, lazy } from "./terse";
export type {
	AtomicDescriptor,
	InstanceDescriptor,
	ListDescriptor,
	NumericVectorDescriptor,
	RecordEncoding,
	RecordVectorDescriptor,
	TypeDescriptor,
	TypeDescriptorKind,
	VectorEncoding,
	XmlMapped,
} from "./type-descriptor";
export {
	atomic,
	deriveItemTag,
	describeType,
	instance,
	isXmlMapped,
	list,
	numericVector,
	recordVector,
} from "./type-descriptor";
